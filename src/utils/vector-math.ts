import type { EmbeddingVector } from "../types/rag.js";

/**
 * L2 normalization for vector embeddings
 */
export function normalizeL2(embedding: readonly number[]): number[] {
  const norm = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));
  return norm > 0 ? embedding.map((val) => val / norm) : [...embedding];
}

export function innerProduct(a: EmbeddingVector, b: EmbeddingVector): number {
  let dot = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
  }
  return dot;
}
