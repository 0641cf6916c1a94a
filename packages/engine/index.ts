// LedgerLens engine
// Semantic chunking of financial statements and multi-agent question answering over them

export { LedgerLensEngine, createEngine } from './src/engine.js';
export type { EngineCollaborators, EngineOptions } from './src/engine.js';

export { Orchestrator, ConfidenceValidator, relaxSubQuery, aggregateConfidence, createSpecialist } from './orchestrator/index.js';
export type { OrchestratorConfig, AnswerOptions, ValidationOutcome } from './orchestrator/index.js';

export { QueryRouter, CATEGORY_ORDER } from './router/query-router.js';
export type { RoutedQuestion, RoutingDecision } from './router/query-router.js';

export { BaseSpecialistAgent, scoreConfidence } from './agents/specialist-agent.js';
export type { SpecialistAgent, AgentDependencies, AgentRetrieval, Findings, ConsistencyCheck } from './agents/specialist-agent.js';
export { CalculationAgent } from './agents/calculation-agent.js';
export { TemporalComparisonAgent } from './agents/temporal-agent.js';
export { RiskExtractionAgent } from './agents/risk-agent.js';
export { GeneralAgent } from './agents/general-agent.js';

export { IngestionPipeline, parseExtractedDocument, ExtractedDocumentSchema } from './ingestion/pipeline.js';
export type { IngestionReport, BatchIngestionResult, BatchIngestionOptions } from './ingestion/pipeline.js';
export { detectBoundaries } from './ingestion/boundary-detector.js';
export { chunkDocument, DEFAULT_CHUNK_BOUNDS } from './ingestion/semantic-chunker.js';

export { RetrievalGateway } from './retrieval/retrieval-gateway.js';
export { LocalVectorIndex } from './retrieval/local-vector-index.js';
export { PgVectorIndex } from './retrieval/pg-vector-index.js';

export { OpenAIEmbedder, HashingEmbedder } from './utils/embedder.js';
export { AnthropicLanguageModel } from './utils/language-model.js';

// Configuration and collaborator factory (LEDGERLENS_* environment variables)
export * from './config/index.js';

export * from './types/index.js';
