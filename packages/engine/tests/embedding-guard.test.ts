import { describe, it, expect } from 'vitest';
import { validateEmbedding, computeValidatedEmbeddings, EmbeddingQualityError } from '../db/embedding-guard.js';

/** Unit vector with varied components */
function makeUnitVector(dim: number): Float32Array {
  const vec = new Float32Array(dim);
  for (let i = 0; i < dim; i++) {
    vec[i] = Math.sin(i * 0.37) * Math.cos(i * 0.13);
  }
  let norm = 0;
  for (let i = 0; i < dim; i++) norm += vec[i] * vec[i];
  norm = Math.sqrt(norm);
  for (let i = 0; i < dim; i++) vec[i] /= norm;
  return vec;
}

describe('embedding-guard', () => {
  describe('validateEmbedding', () => {
    it('accepts a valid unit vector', () => {
      expect(() => validateEmbedding(makeUnitVector(256))).not.toThrow();
    });

    it('accepts a one-hot unit vector', () => {
      const vec = new Float32Array(17);
      vec[0] = 1;
      expect(() => validateEmbedding(vec)).not.toThrow();
    });

    it('rejects an empty vector', () => {
      expect(() => validateEmbedding(new Float32Array(0))).toThrow('Empty embedding vector');
    });

    it('rejects a constant vector', () => {
      const vec = new Float32Array(256).fill(0.0625);
      expect(() => validateEmbedding(vec)).toThrow(/variance too low/);
    });

    it('rejects a vector with L2 norm far from 1.0', () => {
      const vec = makeUnitVector(256);
      for (let i = 0; i < vec.length; i++) vec[i] *= 5;
      expect(() => validateEmbedding(vec)).toThrow(/L2 norm out of range/);
    });

    it('exposes variance and l2Norm on the error', () => {
      const vec = new Float32Array(256).fill(0.1);
      try {
        validateEmbedding(vec);
        expect.unreachable('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(EmbeddingQualityError);
        if (!(err instanceof EmbeddingQualityError)) return;
        expect(err.variance).toBeLessThan(0.001);
        expect(err.l2Norm).toBeGreaterThan(1.1);
      }
    });

    it('includes text context in the error message', () => {
      const vec = new Float32Array(256).fill(0.1);
      expect(() => validateEmbedding(vec, 'Net income rose in FY2023'))
        .toThrow(/Net income rose in FY2023/);
    });

    it('honours a custom norm window', () => {
      const vec = makeUnitVector(64);
      for (let i = 0; i < vec.length; i++) vec[i] *= 2;
      expect(() => validateEmbedding(vec, undefined, { minNorm: 1.5, maxNorm: 2.5 })).not.toThrow();
    });
  });

  describe('computeValidatedEmbeddings', () => {
    it('returns the batch when every vector is valid', async () => {
      const vectors = [makeUnitVector(64), makeUnitVector(64)];
      const result = await computeValidatedEmbeddings(async () => vectors, ['a', 'b']);
      expect(result).toBe(vectors);
    });

    it('rejects a batch of the wrong length', async () => {
      await expect(computeValidatedEmbeddings(async () => [makeUnitVector(64)], ['a', 'b']))
        .rejects.toThrow('Expected 2 embeddings, received 1');
    });

    it('names the text whose vector failed', async () => {
      const bad = new Float32Array(64).fill(0.1);
      await expect(computeValidatedEmbeddings(async () => [makeUnitVector(64), bad], ['revenue', 'cash flow']))
        .rejects.toThrow(/cash flow/);
    });
  });
});
