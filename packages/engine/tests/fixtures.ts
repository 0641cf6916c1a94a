// Shared builders and in-process collaborators for the engine tests

import type { ExtractedDocument, ExtractedPage, StatementType, TableRegion } from '../types/document.js';
import type { Chunk, ChunkContent, ChunkFilter, ChunkKind } from '../types/chunk.js';
import type { CompletionRequest, Embedder, LanguageModel } from '../types/collaborators.js';
import type { RetrievalCandidate, RetrievalResult, SubQuery, TaskCategory } from '../types/query.js';
import type { BackoffPolicy } from '../utils/retry.js';
import { matchesFilter } from '../retrieval/filter.js';
import { compareMatches } from '../retrieval/local-vector-index.js';

export const NO_BACKOFF: BackoffPolicy = { maxRetries: 0, baseDelayMs: 0, factor: 1, maxDelayMs: 0 };

// ── Extracted documents ─────────────────────────────────────────────

export function table(offset: number, rows: string[][], extra: Partial<TableRegion> = {}): TableRegion {
  return {
    offset,
    rows: rows.map((cells, row) => cells.map((text, column) => ({ row, column, text }))),
    ...extra,
  };
}

export function page(
  documentId: string,
  pageNumber: number,
  spans: Array<[number, string]>,
  tables: TableRegion[] = [],
): ExtractedPage {
  return {
    documentId,
    pageNumber,
    spans: spans.map(([offset, text]) => ({ offset, text })),
    tables,
  };
}

/**
 * Two-page annual report: an income statement table on page 1 and a risk
 * section on page 2.
 */
export function annualReport(documentId = 'annual-2023'): ExtractedDocument {
  return {
    documentId,
    fiscalPeriods: ['FY2023'],
    pages: [
      page(documentId, 1, [[0, 'Consolidated Income Statement']], [
        table(40, [
          ['USD millions', '2023', '2022'],
          ['Revenue', '1,200', '1,000'],
          ['Net income', '150', '120'],
        ]),
      ]),
      page(documentId, 2, [
        [0, 'Risk Management'],
        [20, 'The group is exposed to credit risk on its loan book. Liquidity risk is managed by the treasury function.'],
      ]),
    ],
  };
}

// ── Chunks and candidates ───────────────────────────────────────────

export interface ChunkSpec {
  id: string;
  documentId?: string;
  kind?: ChunkKind;
  content: readonly ChunkContent[];
  statementType?: StatementType;
  fiscalYears?: number[];
  pageStart?: number;
  pageEnd?: number;
}

export function makeChunk(spec: ChunkSpec): Chunk {
  const text = spec.content
    .map(block => block.type === 'text'
      ? block.text
      : [...block.headerRows, ...block.rows].map(r => r.join(' | ')).join('\n'))
    .join('\n\n');
  const years = spec.fiscalYears ?? [];
  return {
    id: spec.id,
    documentId: spec.documentId ?? 'annual-2023',
    ordinal: 0,
    kind: spec.kind ?? (spec.content.every(b => b.type === 'table') ? 'tabular' : 'narrative'),
    content: spec.content,
    text,
    tokens: Math.ceil(text.length / 4),
    metadata: {
      fiscalPeriods: years.map(y => `FY${y}`),
      fiscalYears: years,
      statementType: spec.statementType ?? 'unclassified',
      pageStart: spec.pageStart ?? 1,
      pageEnd: spec.pageEnd ?? spec.pageStart ?? 1,
      sourceBoundaryIds: [],
    },
  };
}

export function tableBlock(headerRows: string[][], rows: string[][], tableIndex = 0): ChunkContent {
  return { type: 'table', tableIndex, headerRows, rows };
}

export function textBlock(text: string): ChunkContent {
  return { type: 'text', text };
}

export function candidate(chunk: Chunk, score: number, filters: ChunkFilter = {}): RetrievalCandidate {
  return { chunkId: chunk.id, score, filters, chunk };
}

export function subQuery(overrides: Partial<SubQuery> & { category: TaskCategory; question: string }): SubQuery {
  return {
    id: `q1:${overrides.category}`,
    questionId: 'q1',
    instruction: 'test instruction',
    filters: {},
    fiscalYears: [],
    relaxation: 0,
    ...overrides,
  };
}

// ── Collaborators ───────────────────────────────────────────────────

/**
 * Bag-of-keywords embedder: one dimension per vocabulary word plus a constant
 * bias dimension, so every pair of texts has a positive similarity.
 */
export class KeywordEmbedder implements Embedder {
  readonly model = 'keyword-test';
  calls = 0;

  constructor(private readonly vocabulary: readonly string[]) {}

  async embed(texts: readonly string[]): Promise<Float32Array[]> {
    this.calls++;
    return texts.map(text => this.embedOne(text));
  }

  embedOne(text: string): Float32Array {
    const vec = new Float32Array(this.vocabulary.length + 1);
    vec[0] = 1;
    for (const token of text.toLowerCase().match(/[a-z]+|\d+/g) ?? []) {
      const i = this.vocabulary.indexOf(token);
      if (i !== -1) vec[i + 1] += 1;
    }
    let norm = 0;
    for (const v of vec) norm += v * v;
    norm = Math.sqrt(norm);
    return vec.map(v => v / norm);
  }
}

export const FINANCE_VOCABULARY = [
  'revenue', 'net', 'income', '2021', '2022', '2023', '2024', 'risk',
  'credit', 'liquidity', 'margin', 'cash', 'assets', 'equity', 'profit', 'statement',
];

export interface SearchCall {
  query: string;
  filters: ChunkFilter;
  topK?: number;
}

/**
 * In-process stand-in for the Retrieval Gateway: fixed similarity per chunk,
 * metadata filters applied the way the vector index applies them.
 */
export class FixtureGateway {
  readonly calls: SearchCall[] = [];

  constructor(private readonly entries: Array<{ chunk: Chunk; score: number }>) {}

  async search(query: string, filters: ChunkFilter = {}, topK?: number): Promise<RetrievalResult> {
    this.calls.push({ query, filters, topK });
    const candidates = this.entries
      .filter(e => matchesFilter(e.chunk, filters))
      .map(e => ({ chunkId: e.chunk.id, score: e.score }))
      .sort(compareMatches)
      .slice(0, topK ?? 8)
      .map(m => {
        const entry = this.entries.find(e => e.chunk.id === m.chunkId);
        return entry ? [candidate(entry.chunk, entry.score, filters)] : [];
      })
      .flat();
    return { candidates, outcome: candidates.length > 0 ? 'ok' : 'empty' };
  }

  async fiscalYears(): Promise<number[]> {
    const years = new Set(this.entries.flatMap(e => e.chunk.metadata.fiscalYears));
    return [...years].sort((a, b) => a - b);
  }
}

/** Language model that replays scripted replies, or fails when the script says so */
export class ScriptedLanguageModel implements LanguageModel {
  readonly model = 'scripted-test';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) throw new Error('No scripted reply');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
