// Embedding quality guard - validates vectors before storage or search
// Catches degenerate output (constant or zero vectors, unnormalized vectors) from the embedding collaborator

export class EmbeddingQualityError extends Error {
  constructor(
    message: string,
    public readonly variance: number,
    public readonly l2Norm: number,
  ) {
    super(message);
    this.name = 'EmbeddingQualityError';
  }
}

export interface EmbeddingGuardOptions {
  /** Minimum component variance as a fraction of 1/dimensions, the variance of a spread unit vector */
  minRelativeVariance?: number;
  minNorm?: number;
  maxNorm?: number;
}

/**
 * Validate an embedding vector.
 *
 * Checks:
 * 1. Component variance >= minRelativeVariance / dimensions (default 0.1 / n)
 * 2. L2 norm within [0.9, 1.1]; embedding models return unit vectors
 *
 * @throws EmbeddingQualityError if validation fails
 */
export function validateEmbedding(embedding: Float32Array, text?: string, options: EmbeddingGuardOptions = {}): void {
  const { minRelativeVariance = 0.1, minNorm = 0.9, maxNorm = 1.1 } = options;
  const n = embedding.length;
  if (n === 0) {
    throw new EmbeddingQualityError('Empty embedding vector', 0, 0);
  }

  let sum = 0;
  for (let i = 0; i < n; i++) sum += embedding[i];
  const mean = sum / n;

  let varianceSum = 0;
  let normSum = 0;
  for (let i = 0; i < n; i++) {
    const diff = embedding[i] - mean;
    varianceSum += diff * diff;
    normSum += embedding[i] * embedding[i];
  }
  const variance = varianceSum / n;
  const l2Norm = Math.sqrt(normSum);
  const context = text ? ` for text "${text.slice(0, 50)}..."` : '';

  const minVariance = minRelativeVariance / n;
  if (variance < minVariance) {
    throw new EmbeddingQualityError(
      `Embedding variance too low (${variance.toExponential(3)} < ${minVariance.toExponential(3)})${context}`,
      variance,
      l2Norm,
    );
  }

  if (l2Norm < minNorm || l2Norm > maxNorm) {
    throw new EmbeddingQualityError(
      `Embedding L2 norm out of range (${l2Norm.toFixed(4)}, expected [${minNorm}, ${maxNorm}])${context}`,
      variance,
      l2Norm,
    );
  }
}

/** Embed a batch and validate every vector against its text */
export async function computeValidatedEmbeddings(
  computeFn: (texts: readonly string[]) => Promise<Float32Array[]>,
  texts: readonly string[],
  options?: EmbeddingGuardOptions,
): Promise<Float32Array[]> {
  const embeddings = await computeFn(texts);
  if (embeddings.length !== texts.length) {
    throw new EmbeddingQualityError(
      `Expected ${texts.length} embeddings, received ${embeddings.length}`,
      0,
      0,
    );
  }
  embeddings.forEach((embedding, i) => validateEmbedding(embedding, texts[i], options));
  return embeddings;
}
