/**
 * Lexical index tunables
 */

/**
 * Vocabulary cap; the most frequent terms across the corpus are kept
 */
export const MAX_FEATURES = 5000;

/**
 * Unigrams and bigrams
 */
export const NGRAM_RANGE: readonly [number, number] = [1, 2];
