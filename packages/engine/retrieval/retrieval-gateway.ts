// Retrieval Gateway - the only path from agents to the embedding model and vector index
// Collaborator failures degrade to an empty result with outcome 'unavailable'; they never raise

import type { ChunkFilter } from '../types/chunk.js';
import type { Embedder, VectorIndex } from '../types/collaborators.js';
import type { RetrievalCandidate, RetrievalResult } from '../types/query.js';
import { createEvent, type EventHandler } from '../types/events.js';
import { errorMessage } from '../types/errors.js';
import { AbortedError, DEFAULT_BACKOFF, withRetry, type BackoffPolicy } from '../utils/retry.js';
import { computeValidatedEmbeddings, type EmbeddingGuardOptions } from '../db/embedding-guard.js';
import { compareMatches } from './local-vector-index.js';
import { describeFilter } from './filter.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('RetrievalGateway');

export const DEFAULT_SIMILARITY_FLOOR = 0.3;
export const DEFAULT_TOP_K = 8;
export const DEFAULT_MAX_TOP_K = 20;

export interface RetrievalGatewayOptions {
  embedder: Embedder;
  index: VectorIndex;
  similarityFloor?: number;
  defaultTopK?: number;
  maxTopK?: number;
  backoff?: BackoffPolicy;
  /** Queue calls so the collaborators never see two concurrent requests from this gateway */
  serialize?: boolean;
  /** Embedding quality guard settings; false disables the guard */
  guard?: EmbeddingGuardOptions | false;
  onEvent?: EventHandler;
}

export class RetrievalGateway {
  readonly similarityFloor: number;
  readonly defaultTopK: number;
  readonly maxTopK: number;
  private readonly embedder: Embedder;
  private readonly index: VectorIndex;
  private readonly backoff: BackoffPolicy;
  private readonly serialize: boolean;
  private readonly guard: EmbeddingGuardOptions | false;
  private readonly onEvent?: EventHandler;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RetrievalGatewayOptions) {
    this.embedder = options.embedder;
    this.index = options.index;
    this.similarityFloor = options.similarityFloor ?? DEFAULT_SIMILARITY_FLOOR;
    this.maxTopK = Math.max(1, options.maxTopK ?? DEFAULT_MAX_TOP_K);
    this.defaultTopK = this.clampTopK(options.defaultTopK ?? DEFAULT_TOP_K);
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.serialize = options.serialize ?? false;
    this.guard = options.guard ?? {};
    this.onEvent = options.onEvent;
  }

  clampTopK(topK: number): number {
    if (!Number.isFinite(topK)) return this.maxTopK;
    return Math.min(this.maxTopK, Math.max(1, Math.floor(topK)));
  }

  /** Ranked candidates above the similarity floor; empty on no match or collaborator failure */
  async retrieve(
    queryText: string,
    filters: ChunkFilter = {},
    topK: number = this.defaultTopK,
    signal?: AbortSignal,
  ): Promise<RetrievalCandidate[]> {
    const result = await this.search(queryText, filters, topK, signal);
    return result.candidates;
  }

  /**
   * Like retrieve(), and reports whether an empty list means "nothing matched"
   * or "a collaborator was unavailable". Aborting the signal rejects with AbortedError.
   */
  async search(
    queryText: string,
    filters: ChunkFilter = {},
    topK: number = this.defaultTopK,
    signal?: AbortSignal,
  ): Promise<RetrievalResult> {
    const k = this.clampTopK(topK);
    const result = await this.enqueue(() => this.runSearch(queryText, filters, k, signal));
    this.onEvent?.(createEvent('RetrievalIssued', 'QuestionAnswering', {
      query: queryText,
      filters: describeFilter(filters),
      topK: k,
      outcome: result.outcome,
      candidates: result.candidates.length,
    }));
    return result;
  }

  /** Fiscal years present in the index; empty when the index cannot be reached */
  async fiscalYears(documentIds?: readonly string[], signal?: AbortSignal): Promise<number[]> {
    try {
      return await this.enqueue(() =>
        withRetry('vector-index', () => this.index.fiscalYears(documentIds), this.backoff, signal),
      );
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      log.warn('Fiscal year catalog unavailable', { error: errorMessage(err) });
      return [];
    }
  }

  private async runSearch(
    queryText: string,
    filters: ChunkFilter,
    topK: number,
    signal?: AbortSignal,
  ): Promise<RetrievalResult> {
    try {
      const [embedding] = await withRetry('embedding', () => this.embed(queryText, signal), this.backoff, signal);
      const matches = await withRetry(
        'vector-index',
        () => this.index.query(embedding, filters, topK),
        this.backoff,
        signal,
      );

      const kept = matches
        .filter(m => m.score >= this.similarityFloor)
        .sort(compareMatches)
        .slice(0, topK);
      if (kept.length === 0) {
        log.debug('No candidates above similarity floor', { floor: this.similarityFloor, filters: describeFilter(filters) });
        return { candidates: [], outcome: 'empty' };
      }

      const chunks = await withRetry(
        'vector-index',
        () => this.index.getChunks(kept.map(m => m.chunkId)),
        this.backoff,
        signal,
      );
      const byId = new Map(chunks.map(c => [c.id, c]));
      const candidates: RetrievalCandidate[] = [];
      for (const match of kept) {
        const chunk = byId.get(match.chunkId);
        if (chunk) candidates.push({ chunkId: match.chunkId, score: match.score, filters, chunk });
      }
      return { candidates, outcome: candidates.length > 0 ? 'ok' : 'empty' };
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      log.warn('Retrieval unavailable', { error: errorMessage(err), filters: describeFilter(filters) });
      return { candidates: [], outcome: 'unavailable' };
    }
  }

  private async embed(text: string, signal?: AbortSignal): Promise<Float32Array[]> {
    const compute = (texts: readonly string[]) => this.embedder.embed(texts, signal);
    if (this.guard === false) return compute([text]);
    return computeValidatedEmbeddings(compute, [text], this.guard);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (!this.serialize) return task();
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
