#!/usr/bin/env node
// LedgerLens — command line
//
// Usage:
//   ledgerlens ingest report-2023.json report-2022.json        # chunk, embed and index
//   ledgerlens ask "What was the YoY change in net income?" --docs report-2023.json
//   ledgerlens ask --year 2023 --statement income_statement "What was the net margin?"
//   ledgerlens --help

import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import type { FinalAnswer } from '../types/query.js';
import { errorMessage } from '../types/errors.js';
import { ConfigError, loadEngineConfig } from '../config/engine-config.js';
import { createEngine, type LedgerLensEngine } from './engine.js';
import { CliUsageError, parseAskArgs } from './cli-args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

async function readDocument(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`${path} is not valid JSON: ${errorMessage(err)}`);
  }
}

// ── CLI class ───────────────────────────────────────────────────────

class LedgerLensCli {
  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || (rawArgs[0] !== 'ask' && (rawArgs.includes('--help') || rawArgs.includes('-h')))) {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    switch (command) {
      case 'ingest':
        await this.handleIngest(rest);
        break;
      case 'ask':
        await this.handleAsk(rest);
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        process.exitCode = 1;
    }
  }

  // ── Subcommand: ingest ──────────────────────────────────────────

  private async handleIngest(files: string[]): Promise<void> {
    if (files.length === 0) {
      console.error(`  ${c('red', 'Error:')} No document files given. Use "ledgerlens ingest <file.json...>".\n`);
      process.exitCode = 1;
      return;
    }

    const engine = await createEngine(loadEngineConfig());
    if (engine.index.backend === 'local') {
      console.error(c('yellow', '  Note: LEDGERLENS_VECTOR_BACKEND=local keeps the index in memory for this run only.\n'));
    }
    try {
      await this.ingestFiles(engine, files);
    } finally {
      await engine.close();
    }
  }

  private async ingestFiles(engine: LedgerLensEngine, files: string[]): Promise<void> {
    const documents = await Promise.all(files.map(readDocument));
    const result = await engine.ingestDocuments(documents, {
      onProgress: p => {
        if (p.status === 'running') return;
        const mark = p.status === 'completed' ? c('green', '✓') : c('red', '✗');
        console.error(`  ${mark} ${p.current} ${c('dim', `(${p.completed}/${p.total})`)}${p.error ? ` ${p.error}` : ''}`);
      },
    });

    for (const item of result.documents) {
      if (!item.report) continue;
      const { chunksIndexed, chunksRemoved, warnings } = item.report;
      console.log(`  ${c('bold', item.documentId)}: ${chunksIndexed} chunks indexed${chunksRemoved ? `, ${chunksRemoved} replaced` : ''}`);
      for (const warning of warnings) console.log(`    ${c('yellow', '!')} ${warning}`);
    }
    console.log(`\n  ${result.succeeded} succeeded, ${result.failed} failed ${c('dim', `— ${(result.totalDurationMs / 1000).toFixed(1)}s`)}\n`);
    if (result.failed > 0) process.exitCode = 1;
  }

  // ── Subcommand: ask ─────────────────────────────────────────────

  private async handleAsk(args: string[]): Promise<void> {
    const parsed = parseAskArgs(args);
    if (parsed.help) {
      this.printAskHelp();
      return;
    }
    if (!parsed.question) {
      console.error('Error: No question provided. Use "ledgerlens ask --help" for usage.\n');
      process.exitCode = 1;
      return;
    }

    const engine = await createEngine(loadEngineConfig());
    try {
      if (parsed.documentFiles.length > 0) {
        await this.ingestFiles(engine, parsed.documentFiles);
      }

      const answer = await engine.answerQuestion(parsed.question, parsed.filters);
      if (parsed.json) {
        console.log(JSON.stringify(answer, null, 2));
      } else {
        this.printAnswer(answer);
      }
    } finally {
      await engine.close();
    }
  }

  private printAnswer(answer: FinalAnswer): void {
    const status = answer.status === 'composed' ? c('green', 'composed') : c('yellow', 'degraded');
    console.log(`\n${answer.text}\n`);
    console.log(`  ${c('bold', 'Status:')} ${status}  ${c('bold', 'Confidence:')} ${(answer.confidence * 100).toFixed(0)}%  ${c('bold', 'Retries:')} ${answer.retryCount}`);
    if (answer.citations.length > 0) {
      console.log(`  ${c('bold', 'Sources:')}`);
      for (const cite of answer.citations) {
        const pages = cite.pageStart === cite.pageEnd ? `p.${cite.pageStart}` : `pp.${cite.pageStart}-${cite.pageEnd}`;
        console.log(`    ${c('cyan', cite.documentId)} ${pages} ${c('dim', `${cite.statementType} · ${cite.chunkId}`)}`);
      }
    }
    if (answer.caveats.length > 0) {
      console.log(`  ${c('bold', 'Caveats:')}`);
      for (const caveat of answer.caveats) console.log(`    ${c('yellow', '!')} ${caveat}`);
    }
    console.log('');
  }

  // ── Help ────────────────────────────────────────────────────────

  private printHelp(): void {
    console.log(`
  ${c('bold', 'ledgerlens')} — question answering over financial statements

  ${c('bold', 'Commands:')}
    ingest <file.json...>         Chunk, embed and index extracted documents
    ask [options] "<question>"    Answer a question from the indexed statements
    help                          Show this help

  ${c('bold', 'Environment:')}
    LEDGERLENS_VECTOR_BACKEND     local (default) or postgres
    LEDGERLENS_EMBEDDER           openai or hashing (default: openai when OPENAI_API_KEY is set)
    OPENAI_API_KEY                Embeddings via the OpenAI API
    ANTHROPIC_API_KEY             Optional. Language model for routing fallback and answer wording
    PG_HOST, PG_DATABASE, ...     PostgreSQL connection for the postgres backend
    LOG_LEVEL                     debug, info (default), warn, error

  ${c('bold', 'Examples:')}
    ledgerlens ingest annual-2023.json annual-2022.json
    ledgerlens ask --docs annual-2023.json "What was the YoY change in net income?"
`);
  }

  private printAskHelp(): void {
    console.log(`
  ${c('bold', 'ledgerlens ask')} — Answer a question

  ${c('bold', 'Usage:')}
    ledgerlens ask [options] "<question>"

  ${c('bold', 'Options:')}
    --docs <a.json,b.json>        Ingest these documents first
    --year <yyyy>                 Restrict to one fiscal year
    --from <yyyy> / --to <yyyy>   Restrict to a fiscal year range
    --statement <type,...>        ${c('dim', 'balance_sheet, income_statement, cash_flow, equity_changes, notes, risk_management, management_commentary, unclassified')}
    --kind <kind,...>             narrative, tabular, mixed
    --document <id,...>           Restrict to document ids
    --json                        Print the FinalAnswer as JSON
    -h, --help                    Show this help
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new LedgerLensCli();
cli.start().catch((err) => {
  if (err instanceof CliUsageError || err instanceof ConfigError) {
    console.error(`${c('red', 'Error:')} ${err.message}`);
  } else {
    console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
  }
  process.exitCode = 1;
});
