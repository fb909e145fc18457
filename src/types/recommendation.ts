/**
 * Recommendation type definitions
 */

import type { Catalog, CatalogItem } from "./catalog";
import type { VectorSpace } from "./lexicalIndex";

/**
 * Catalog item plus its similarity to the query, rounded to 4 decimals
 */
export type Recommendation = CatalogItem & {
  similarity: number;
};

export type RecommendationRequestOptions = {
  /** Page whose text is appended to the query */
  url?: string | null;
  /** Clamped to [1, 10]; defaults to 10 */
  maxResults?: number;
};

/**
 * Process-wide, read-only state built once at startup
 */
export type RecommendationContext = {
  readonly catalog: Catalog;
  readonly index: VectorSpace;
};

/**
 * Anything that can answer recommendation requests
 * (the engine, or a stub in tests)
 */
export interface Recommender {
  getRecommendations(
    query: string,
    options?: RecommendationRequestOptions,
  ): Promise<Recommendation[]>;
}
