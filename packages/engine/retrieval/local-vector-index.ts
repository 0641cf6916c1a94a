// LocalVectorIndex - in-process cosine search over indexed chunks
// Default backend for the CLI and tests; the postgres backend shares the same contract

import type { Chunk, ChunkFilter } from '../types/chunk.js';
import type { IndexedChunk, VectorIndex, VectorMatch } from '../types/collaborators.js';
import { matchesFilter } from './filter.js';

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) {
    throw new RangeError(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Score descending, then chunk id ascending */
export function compareMatches(a: VectorMatch, b: VectorMatch): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

export class LocalVectorIndex implements VectorIndex {
  readonly backend = 'local';
  private entries = new Map<string, IndexedChunk>();

  get size(): number {
    return this.entries.size;
  }

  async upsert(entries: readonly IndexedChunk[]): Promise<void> {
    for (const entry of entries) {
      this.entries.set(entry.chunk.id, entry);
    }
  }

  async deleteDocument(documentId: string, keep: readonly string[] = []): Promise<number> {
    const kept = new Set(keep);
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.chunk.documentId === documentId && !kept.has(id)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async query(embedding: Float32Array, filter: ChunkFilter, topK: number): Promise<VectorMatch[]> {
    const matches: VectorMatch[] = [];
    for (const { chunk, embedding: stored } of this.entries.values()) {
      if (!matchesFilter(chunk, filter)) continue;
      matches.push({ chunkId: chunk.id, score: cosineSimilarity(embedding, stored) });
    }
    matches.sort(compareMatches);
    return matches.slice(0, topK);
  }

  async getChunks(ids: readonly string[]): Promise<Chunk[]> {
    const chunks: Chunk[] = [];
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) chunks.push(entry.chunk);
    }
    return chunks;
  }

  async fiscalYears(documentIds?: readonly string[]): Promise<number[]> {
    const years = new Set<number>();
    for (const { chunk } of this.entries.values()) {
      if (documentIds?.length && !documentIds.includes(chunk.documentId)) continue;
      for (const year of chunk.metadata.fiscalYears) years.add(year);
    }
    return [...years].sort((a, b) => a - b);
  }

  /** Chunks of one document in ordinal order */
  documentChunks(documentId: string): Chunk[] {
    return [...this.entries.values()]
      .map(e => e.chunk)
      .filter(c => c.documentId === documentId)
      .sort((a, b) => a.ordinal - b.ordinal);
  }
}
