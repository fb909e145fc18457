/**
 * Lexical vector space type definitions
 */

/**
 * Sparse weighted vector: column index → weight.
 * Columns absent from the map have weight 0.
 */
export type SparseVector = ReadonlyMap<number, number>;

/**
 * Tunables for fitting a lexical index
 */
export type LexicalIndexOptions = {
  /** Vocabulary cap, most frequent terms kept */
  maxFeatures?: number;
  /** Inclusive [min, max] word n-gram sizes */
  ngramRange?: readonly [number, number];
  /** Terms dropped before n-grams are built */
  stopWords?: ReadonlySet<string>;
};

/**
 * Read-only view of a fitted vector space, as consumed by the engine.
 */
export interface VectorSpace {
  /** One vector per fitted document, in document order */
  readonly vectors: readonly SparseVector[];
  /** False for an empty corpus or an empty vocabulary */
  readonly isUsable: boolean;
  vectorize(text: string): SparseVector;
}
