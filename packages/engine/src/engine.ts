// LedgerLens engine - ingestion and question answering behind one facade
//
// ExtractedDocument → Boundary Detector → Semantic Chunker → Embedder → Vector Index
// Question → Query Router → Specialist Agents ⇄ Retrieval Gateway → Confidence Validator → FinalAnswer

import type { ChunkFilter } from '../types/chunk.js';
import type { Embedder, LanguageModel, VectorIndex } from '../types/collaborators.js';
import type { FinalAnswer } from '../types/query.js';
import { SimpleEventBus, forwardAll, type DomainEvent, type EventBus } from '../types/events.js';
import { loadEngineConfig, type EngineConfig } from '../config/engine-config.js';
import { createConfiguredLanguageModel, createEmbedder, createVectorIndex } from '../config/database.js';
import {
  IngestionPipeline,
  type BatchIngestionOptions,
  type BatchIngestionResult,
  type IngestionReport,
} from '../ingestion/pipeline.js';
import { RetrievalGateway } from '../retrieval/retrieval-gateway.js';
import { Orchestrator, type AnswerOptions } from '../orchestrator/coordinator.js';

export interface EngineCollaborators {
  embedder: Embedder;
  index: VectorIndex;
  languageModel?: LanguageModel | null;
}

export interface EngineOptions {
  onEvent?: (event: { type: string; payload: unknown }) => void;
}

export class LedgerLensEngine {
  readonly config: EngineConfig;
  readonly pipeline: IngestionPipeline;
  readonly gateway: RetrievalGateway;
  readonly orchestrator: Orchestrator;
  readonly eventBus: EventBus;
  readonly index: VectorIndex;

  constructor(config: EngineConfig, collaborators: EngineCollaborators, options: EngineOptions = {}) {
    this.config = config;
    this.index = collaborators.index;
    this.eventBus = new SimpleEventBus();
    const emit = (event: DomainEvent) => this.eventBus.emit(event);
    if (options.onEvent) forwardAll(this.eventBus, options.onEvent);

    this.pipeline = new IngestionPipeline({
      embedder: collaborators.embedder,
      index: collaborators.index,
      chunkBounds: config.chunkBounds,
      backoff: config.backoff,
      onEvent: emit,
    });
    this.gateway = new RetrievalGateway({
      embedder: collaborators.embedder,
      index: collaborators.index,
      similarityFloor: config.similarityFloor,
      defaultTopK: config.topK,
      maxTopK: config.maxTopK,
      backoff: config.backoff,
      serialize: config.serializeRetrieval,
      onEvent: emit,
    });
    this.orchestrator = new Orchestrator({
      gateway: this.gateway,
      languageModel: collaborators.languageModel,
      confidenceThreshold: config.confidenceThreshold,
      maxRetries: config.maxRetries,
      backoff: config.backoff,
      aggregation: config.aggregation,
      questionTimeoutMs: config.questionTimeoutMs,
      topK: config.topK,
      eventBus: this.eventBus,
    });
  }

  ingestDocument(document: unknown, signal?: AbortSignal): Promise<IngestionReport> {
    return this.pipeline.ingestDocument(document, signal);
  }

  ingestDocuments(documents: readonly unknown[], options: BatchIngestionOptions = {}): Promise<BatchIngestionResult> {
    return this.pipeline.ingestDocuments(documents, { concurrency: this.config.ingestConcurrency, ...options });
  }

  answerQuestion(question: string, filters?: ChunkFilter, options?: AnswerOptions): Promise<FinalAnswer> {
    return this.orchestrator.answerQuestion(question, filters, options);
  }

  fiscalYears(documentIds?: readonly string[], signal?: AbortSignal): Promise<number[]> {
    return this.gateway.fiscalYears(documentIds, signal);
  }

  /** Release the chunk store connection; the in-memory backend holds none */
  async close(): Promise<void> {
    if (this.index.backend !== 'postgres') return;
    const { closePool } = await import('../db/pg-client.js');
    await closePool();
  }
}

/**
 * Build an engine from configuration. Collaborators not supplied are created
 * from the config: vector backend, embedder and (when a key is set) language model.
 */
export async function createEngine(
  config: EngineConfig = loadEngineConfig(),
  collaborators: Partial<EngineCollaborators> = {},
  options: EngineOptions = {},
): Promise<LedgerLensEngine> {
  const index = collaborators.index ?? await createVectorIndex(config);
  const embedder = collaborators.embedder ?? await createEmbedder(config);
  const languageModel = collaborators.languageModel !== undefined
    ? collaborators.languageModel
    : await createConfiguredLanguageModel(config);
  return new LedgerLensEngine(config, { index, embedder, languageModel }, options);
}
