import { AppError } from "../../src/lib/errors.js"

/**
 * Cosine similarity: dot(a, b) / (|a| * |b|).
 *
 * Not clamped. A zero vector on either side has no direction, so the
 * result is 0 rather than NaN. Vectors of different length come from
 * different embedding models and cannot be compared.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new AppError(
      "embedding_mismatch",
      500,
      `Embedding dimensions differ (${a.length} vs ${b.length})`,
      { left: a.length, right: b.length }
    )
  }

  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }

  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}
