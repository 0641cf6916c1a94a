// Argument parsing for the ledgerlens CLI

import type { ChunkFilter, ChunkKind, FiscalYearRange } from '../types/chunk.js';
import { STATEMENT_TYPES, type StatementType } from '../types/document.js';

const CHUNK_KINDS: readonly ChunkKind[] = ['narrative', 'tabular', 'mixed'];

export interface AskArgs {
  question: string;
  /** Extracted-document JSON files to ingest before asking */
  documentFiles: string[];
  filters: ChunkFilter;
  json: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function parseYear(flag: string, value: string | undefined): number {
  const year = Number(value);
  if (!value || !Number.isInteger(year) || year < 1900 || year > 2100) {
    throw new CliUsageError(`${flag} expects a four-digit year, got "${value ?? ''}"`);
  }
  return year;
}

function isStatementType(value: string): value is StatementType {
  return STATEMENT_TYPES.some(t => t === value);
}

function isChunkKind(value: string): value is ChunkKind {
  return CHUNK_KINDS.some(k => k === value);
}

function splitList(value: string | undefined): string[] {
  return (value ?? '').split(',').map(v => v.trim()).filter(Boolean);
}

/**
 * Parse `ask` arguments. Repeatable list flags also take comma-separated values:
 * --docs a.json,b.json --statement income_statement --year 2023
 */
export function parseAskArgs(args: readonly string[]): AskArgs {
  const documentFiles: string[] = [];
  const statementTypes: StatementType[] = [];
  const chunkKinds: ChunkKind[] = [];
  const documentIds: string[] = [];
  let range: { from?: number; to?: number } | undefined;
  let json = false;
  let help = false;
  const questionParts: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--docs':
        documentFiles.push(...splitList(args[++i]));
        break;
      case '--year': {
        const year = parseYear(arg, args[++i]);
        range = { from: year, to: year };
        break;
      }
      case '--from':
        range = { ...range, from: parseYear(arg, args[++i]) };
        break;
      case '--to':
        range = { ...range, to: parseYear(arg, args[++i]) };
        break;
      case '--statement':
        for (const value of splitList(args[++i])) {
          if (!isStatementType(value)) {
            throw new CliUsageError(`Unknown statement type "${value}". Valid: ${STATEMENT_TYPES.join(', ')}`);
          }
          statementTypes.push(value);
        }
        break;
      case '--kind':
        for (const value of splitList(args[++i])) {
          if (!isChunkKind(value)) {
            throw new CliUsageError(`Unknown chunk kind "${value}". Valid: ${CHUNK_KINDS.join(', ')}`);
          }
          chunkKinds.push(value);
        }
        break;
      case '--document':
        documentIds.push(...splitList(args[++i]));
        break;
      case '--json':
        json = true;
        break;
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        if (arg.startsWith('--')) throw new CliUsageError(`Unknown option: ${arg}`);
        questionParts.push(arg);
    }
  }

  if (range?.from !== undefined && range.to !== undefined && range.from > range.to) {
    throw new CliUsageError(`--from ${range.from} is after --to ${range.to}`);
  }

  const fiscalYearRange: FiscalYearRange | undefined = range;
  const filters: ChunkFilter = {
    ...(fiscalYearRange ? { fiscalYearRange } : {}),
    ...(statementTypes.length ? { statementTypes } : {}),
    ...(chunkKinds.length ? { chunkKinds } : {}),
    ...(documentIds.length ? { documentIds } : {}),
  };

  return { question: questionParts.join(' ').trim(), documentFiles, filters, json, help };
}
