// Collaborator factory - selects vector index, embedder and language model from EngineConfig
// Vector backends: 'local' (default, in-process) and 'postgres' (pgvector)

import type { Embedder, LanguageModel, VectorIndex } from '../types/collaborators.js';
import type { EngineConfig } from './engine-config.js';

/**
 * Create the VectorIndex for the configured backend.
 * - `local`: LocalVectorIndex (in-memory)
 * - `postgres`: PgVectorIndex (pgvector); pending migrations are applied first
 */
export async function createVectorIndex(config: Pick<EngineConfig, 'vectorBackend'>): Promise<VectorIndex> {
  switch (config.vectorBackend) {
    case 'postgres': {
      const { runMigrations } = await import('../db/pg-client.js');
      await runMigrations();
      const { PgVectorIndex } = await import('../retrieval/pg-vector-index.js');
      return new PgVectorIndex();
    }
    case 'local':
    default: {
      const { LocalVectorIndex } = await import('../retrieval/local-vector-index.js');
      return new LocalVectorIndex();
    }
  }
}

/**
 * Create the Embedder.
 * - `openai`: OpenAIEmbedder, requires OPENAI_API_KEY
 * - `hashing`: HashingEmbedder, offline
 */
export async function createEmbedder(
  config: Pick<EngineConfig, 'embedder' | 'embeddingModel' | 'embeddingDimensions' | 'openaiApiKey'>,
): Promise<Embedder> {
  const { OpenAIEmbedder, HashingEmbedder } = await import('../utils/embedder.js');
  if (config.embedder === 'openai') {
    if (!config.openaiApiKey) {
      throw new Error('LEDGERLENS_EMBEDDER=openai requires OPENAI_API_KEY');
    }
    return new OpenAIEmbedder({ apiKey: config.openaiApiKey, model: config.embeddingModel });
  }
  return new HashingEmbedder(config.embeddingDimensions);
}

/** Anthropic language model when ANTHROPIC_API_KEY is configured, otherwise null */
export async function createConfiguredLanguageModel(
  config: Pick<EngineConfig, 'anthropicApiKey' | 'languageModel'>,
): Promise<LanguageModel | null> {
  if (!config.anthropicApiKey) return null;
  const { AnthropicLanguageModel } = await import('../utils/language-model.js');
  return new AnthropicLanguageModel({ apiKey: config.anthropicApiKey, model: config.languageModel });
}
