// Ports to the external collaborators: embedding model, vector index, language model

import type { Chunk, ChunkFilter } from './chunk.js';

export interface Embedder {
  readonly model: string;
  /** One vector per input text, in input order */
  embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]>;
}

export interface VectorMatch {
  readonly chunkId: string;
  /** Cosine similarity in [-1, 1] */
  readonly score: number;
}

export interface IndexedChunk {
  readonly chunk: Chunk;
  readonly embedding: Float32Array;
}

export interface VectorIndex {
  readonly backend: string;
  upsert(entries: readonly IndexedChunk[]): Promise<void>;
  /** Remove a document's chunks except the ids in `keep`; returns the number removed */
  deleteDocument(documentId: string, keep?: readonly string[]): Promise<number>;
  query(embedding: Float32Array, filter: ChunkFilter, topK: number): Promise<VectorMatch[]>;
  getChunks(ids: readonly string[]): Promise<Chunk[]>;
  /** Distinct fiscal years present, ascending, optionally within some documents */
  fiscalYears(documentIds?: readonly string[]): Promise<number[]>;
}

export interface CompletionRequest {
  system?: string;
  prompt: string;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LanguageModel {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}
