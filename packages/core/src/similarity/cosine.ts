import { DimensionMismatch } from '../errors'

/**
 * Added to every cosine similarity before ranking so scores land in [0, 2].
 * Stores that reject negative relevance scores need this, and persisted
 * expectations depend on it: keep it identical everywhere scores are produced.
 */
export const SCORE_SHIFT = 1.0

/**
 * Cosine similarity of two equal-length vectors:
 * `(a·b) / (‖a‖ ‖b‖)`, computed in double precision.
 *
 * Returns 0 when either vector has zero magnitude so ranking never sees NaN.
 * Throws {@link DimensionMismatch} when the lengths differ.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatch(a.length, b.length, 'cosine similarity')
  }

  let dot = 0
  let sumSqA = 0
  let sumSqB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    sumSqA += a[i] * a[i]
    sumSqB += b[i] * b[i]
  }

  if (sumSqA === 0 || sumSqB === 0) return 0
  return dot / (Math.sqrt(sumSqA) * Math.sqrt(sumSqB))
}

/** The relevance score a record is ranked by. */
export function shiftedScore(query: readonly number[], vector: readonly number[]): number {
  return cosineSimilarity(query, vector) + SCORE_SHIFT
}
