export { loadEngineConfig, ConfigError } from './engine-config.js';
export type { EngineConfig, AggregationPolicy, VectorBackend, EmbedderKind } from './engine-config.js';
export { createVectorIndex, createEmbedder, createConfiguredLanguageModel } from './database.js';
export { LEXICON, buildLexicon, findMetric, containsPhrase } from './lexicon.js';
export type { Lexicon, MetricDefinition, RatioDefinition, StatementPhrase } from './lexicon.js';
