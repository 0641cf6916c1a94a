// Embedding collaborators: OpenAI embeddings API, and an offline feature-hashing embedder

import type { Embedder } from '../types/collaborators.js';

type OpenAIClient = InstanceType<typeof import('openai').default>;

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export interface OpenAIEmbedderOptions {
  apiKey: string;
  model?: string;
  /** Inputs per API request */
  batchSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  readonly model: string;
  private readonly apiKey: string;
  private readonly batchSize: number;
  private clientPromise: Promise<OpenAIClient> | null = null;

  constructor(options: OpenAIEmbedderOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.batchSize = options.batchSize ?? 64;
  }

  private getClient(): Promise<OpenAIClient> {
    if (!this.clientPromise) {
      this.clientPromise = import('openai').then(mod => new mod.default({ apiKey: this.apiKey }));
    }
    return this.clientPromise;
  }

  async embed(texts: readonly string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const client = await this.getClient();
    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const response = await client.embeddings.create(
        { model: this.model, input: [...batch] },
        { signal },
      );
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      for (const item of ordered) out.push(Float32Array.from(item.embedding));
    }
    return out;
  }
}

const TOKEN = /[a-z][a-z0-9%-]*|\d{4}/g;

// FNV-1a, 32 bit
function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Bag-of-words feature hashing with signed buckets and L2 normalization.
 * Word unigrams and bigrams; years are kept as tokens, other numbers dropped.
 */
export class HashingEmbedder implements Embedder {
  readonly model: string;

  constructor(private readonly dimensions = 256) {
    this.model = `hashing-${dimensions}`;
  }

  async embed(texts: readonly string[]): Promise<Float32Array[]> {
    return texts.map(text => this.embedOne(text));
  }

  embedOne(text: string): Float32Array {
    const vec = new Float32Array(this.dimensions);
    const words = text.toLowerCase().match(TOKEN) ?? [];
    const features = [...words, ...words.slice(1).map((w, i) => `${words[i]} ${w}`)];
    for (const feature of features) {
      const h = fnv1a(feature);
      vec[h % this.dimensions] += (h & 0x80000000) === 0 ? 1 : -1;
    }
    let norm = 0;
    for (let i = 0; i < vec.length; i++) norm += vec[i] * vec[i];
    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (let i = 0; i < vec.length; i++) vec[i] /= norm;
    }
    return vec;
  }
}
