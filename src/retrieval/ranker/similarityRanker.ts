/**
 * Similarity ranker
 *
 * Scores a query vector against every catalog vector and returns a total
 * order: score descending, catalog index ascending among equal scores.
 */

import type { RankedCandidate, SparseVector } from "@/types";

function magnitude(vector: SparseVector): number {
  let sumOfSquares = 0;
  for (const weight of vector.values()) {
    sumOfSquares += weight * weight;
  }
  return Math.sqrt(sumOfSquares);
}

/**
 * Dot product over the product of magnitudes; 0 when either vector is zero.
 *
 * General cosine: negative weights give negative scores. TF-IDF rows never
 * carry negative weights, so ranked scores stay within [0, 1].
 */
export function cosineSimilarity(a: SparseVector, b: SparseVector): number {
  const magnitudeA = magnitude(a);
  const magnitudeB = magnitude(b);
  if (magnitudeA === 0 || magnitudeB === 0) {
    return 0;
  }

  // Iterate the sparser side
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let dot = 0;
  for (const [column, weight] of small) {
    const other = large.get(column);
    if (other !== undefined) {
      dot += weight * other;
    }
  }

  return dot / (magnitudeA * magnitudeB);
}

/**
 * Rank every vector against the query.
 *
 * @returns One entry per vector, best first
 */
export function rankBySimilarity(
  query: SparseVector,
  vectors: readonly SparseVector[],
): RankedCandidate[] {
  return vectors
    .map((vector, index) => ({
      index,
      score: cosineSimilarity(query, vector),
    }))
    .sort((a, b) => b.score - a.score || a.index - b.index);
}
