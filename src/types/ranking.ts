/**
 * Similarity ranking type definitions
 */

export type RankedCandidate = {
  /** Row index into the catalog / vector matrix */
  index: number;
  /** Cosine similarity against the query */
  score: number;
};
