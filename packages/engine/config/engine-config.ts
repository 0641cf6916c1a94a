// Engine configuration from LEDGERLENS_* environment variables, validated with zod

import { z } from 'zod';
import type { ChunkBounds } from '../types/chunk.js';
import type { BackoffPolicy } from '../utils/retry.js';

const int = (fallback: number) => z.coerce.number().int().default(fallback);
const num = (fallback: number) => z.coerce.number().default(fallback);

const EnvSchema = z.object({
  LEDGERLENS_CHUNK_LOWER: int(200).pipe(z.number().min(1)),
  LEDGERLENS_CHUNK_UPPER: int(500).pipe(z.number().min(1)),
  LEDGERLENS_CONFIDENCE_THRESHOLD: num(0.6).pipe(z.number().min(0).max(1)),
  LEDGERLENS_MAX_RETRIES: int(2).pipe(z.number().min(0).max(10)),
  LEDGERLENS_BACKOFF_BASE_MS: int(1000).pipe(z.number().min(0)),
  LEDGERLENS_BACKOFF_FACTOR: num(3).pipe(z.number().min(1)),
  LEDGERLENS_BACKOFF_MAX_MS: int(30_000).pipe(z.number().min(0)),
  LEDGERLENS_SIMILARITY_FLOOR: num(0.3).pipe(z.number().min(-1).max(1)),
  LEDGERLENS_TOP_K: int(8).pipe(z.number().min(1)),
  LEDGERLENS_MAX_TOP_K: int(20).pipe(z.number().min(1)),
  LEDGERLENS_QUESTION_TIMEOUT_MS: int(60_000).pipe(z.number().min(1)),
  LEDGERLENS_AGGREGATION: z.enum(['min', 'mean']).default('min'),
  LEDGERLENS_VECTOR_BACKEND: z
    .string()
    .default('local')
    .transform(v => v.toLowerCase())
    .pipe(z.enum(['local', 'postgres', 'pg']))
    .transform((v): VectorBackend => (v === 'pg' ? 'postgres' : v)),
  LEDGERLENS_EMBEDDER: z.enum(['openai', 'hashing']).optional(),
  LEDGERLENS_EMBEDDING_MODEL: z.string().min(1).optional(),
  LEDGERLENS_EMBEDDING_DIMENSIONS: int(256).pipe(z.number().min(8)),
  LEDGERLENS_LLM_MODEL: z.string().min(1).optional(),
  LEDGERLENS_SERIALIZE_RETRIEVAL: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(v => v === 'true' || v === '1'),
  LEDGERLENS_INGEST_CONCURRENCY: int(3).pipe(z.number().min(1)),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
});

export type AggregationPolicy = 'min' | 'mean';
export type VectorBackend = 'local' | 'postgres';
export type EmbedderKind = 'openai' | 'hashing';

export interface EngineConfig {
  chunkBounds: ChunkBounds;
  confidenceThreshold: number;
  maxRetries: number;
  backoff: BackoffPolicy;
  similarityFloor: number;
  topK: number;
  maxTopK: number;
  questionTimeoutMs: number;
  aggregation: AggregationPolicy;
  vectorBackend: VectorBackend;
  embedder: EmbedderKind;
  embeddingModel?: string;
  embeddingDimensions: number;
  languageModel?: string;
  serializeRetrieval: boolean;
  ingestConcurrency: number;
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse engine settings from an environment map. Unset variables take their
 * defaults; malformed ones raise ConfigError listing every issue.
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;

  if (e.LEDGERLENS_CHUNK_UPPER < e.LEDGERLENS_CHUNK_LOWER) {
    const issue = `LEDGERLENS_CHUNK_UPPER (${e.LEDGERLENS_CHUNK_UPPER}) must be >= LEDGERLENS_CHUNK_LOWER (${e.LEDGERLENS_CHUNK_LOWER})`;
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }

  return {
    chunkBounds: { lower: e.LEDGERLENS_CHUNK_LOWER, upper: e.LEDGERLENS_CHUNK_UPPER },
    confidenceThreshold: e.LEDGERLENS_CONFIDENCE_THRESHOLD,
    maxRetries: e.LEDGERLENS_MAX_RETRIES,
    backoff: {
      maxRetries: e.LEDGERLENS_MAX_RETRIES,
      baseDelayMs: e.LEDGERLENS_BACKOFF_BASE_MS,
      factor: e.LEDGERLENS_BACKOFF_FACTOR,
      maxDelayMs: e.LEDGERLENS_BACKOFF_MAX_MS,
    },
    similarityFloor: e.LEDGERLENS_SIMILARITY_FLOOR,
    topK: Math.min(e.LEDGERLENS_TOP_K, e.LEDGERLENS_MAX_TOP_K),
    maxTopK: e.LEDGERLENS_MAX_TOP_K,
    questionTimeoutMs: e.LEDGERLENS_QUESTION_TIMEOUT_MS,
    aggregation: e.LEDGERLENS_AGGREGATION,
    vectorBackend: e.LEDGERLENS_VECTOR_BACKEND,
    embedder: e.LEDGERLENS_EMBEDDER ?? (e.OPENAI_API_KEY ? 'openai' : 'hashing'),
    embeddingModel: e.LEDGERLENS_EMBEDDING_MODEL,
    embeddingDimensions: e.LEDGERLENS_EMBEDDING_DIMENSIONS,
    languageModel: e.LEDGERLENS_LLM_MODEL,
    serializeRetrieval: e.LEDGERLENS_SERIALIZE_RETRIEVAL,
    ingestConcurrency: e.LEDGERLENS_INGEST_CONCURRENCY,
    openaiApiKey: e.OPENAI_API_KEY,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
  };
}
