/**
 * Evaluation constants
 */

export const EVALUATION_SET_PATH = "data/evaluation_set.json";

/**
 * Cutoff used by Recall@K and AP@K when the caller gives none
 */
export const DEFAULT_EVALUATION_K = 3;

/**
 * Result count requested per labeled query in a system evaluation
 */
export const SYSTEM_EVALUATION_MAX_RESULTS = 10;

export const RECENT_EVALUATION_RUNS_LIMIT = 10;
