/**
 * Recommendation engine constants
 */

export const DEFAULT_MAX_RESULTS = 10;
export const MIN_MAX_RESULTS = 1;
export const MAX_MAX_RESULTS = 10;

/**
 * Decimal places kept on returned similarity scores
 */
export const SIMILARITY_DECIMALS = 4;
