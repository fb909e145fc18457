/**
 * Recommendation engine
 *
 * Per request (no state carried between calls):
 * 1. Append fetched page text to the query when a URL is given
 * 2. Lowercase and collapse whitespace
 * 3. Return [] for an empty catalog or unusable index
 * 4. Vectorize and rank every catalog item
 * 5. Extract a duration limit from the preprocessed query
 * 6. Walk the ranking, skipping items over the limit, until maxResults
 * 7. If nothing survived, return the top-ranked item regardless of the limit
 * 8. Attach similarity rounded to 4 decimals
 *
 * Step 7 can return an item over the duration limit.
 */

import type {
  DurationConstraint,
  Logger,
  PageTextFetcher,
  RankedCandidate,
  Recommendation,
  RecommendationContext,
  RecommendationRequestOptions,
  Recommender,
} from "@/types";
import {
  DEFAULT_MAX_RESULTS,
  MAX_MAX_RESULTS,
  MIN_MAX_RESULTS,
  SIMILARITY_DECIMALS,
} from "@/constants/recommendation";
import { rankBySimilarity } from "@/retrieval/ranker";
import {
  extractDuration,
  parseItemDuration,
} from "@/retrieval/constraints";
import { preprocessQuery } from "@/utils/text/textNormalization";
import * as logger from "@/logger";

/**
 * Unexpected failure inside the engine (corrupt state, programming error).
 * Expected conditions never surface as this error.
 */
export class RecommendationEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecommendationEngineError";
  }
}

export type RecommendationEngineDeps = {
  /** Omit to ignore URLs entirely */
  fetchPageText?: PageTextFetcher;
  logger?: Logger;
};

/**
 * Clamp a requested result count into [1, 10]; non-numbers get the default
 */
export function clampMaxResults(maxResults: number | undefined): number {
  if (maxResults === undefined || !Number.isFinite(maxResults)) {
    return DEFAULT_MAX_RESULTS;
  }
  return Math.min(
    Math.max(Math.trunc(maxResults), MIN_MAX_RESULTS),
    MAX_MAX_RESULTS,
  );
}

export function roundSimilarity(score: number): number {
  const factor = 10 ** SIMILARITY_DECIMALS;
  return Math.round(score * factor) / factor;
}

export class RecommendationEngine implements Recommender {
  private readonly context: RecommendationContext;
  private readonly fetchPageText?: PageTextFetcher;
  private readonly log: Logger;

  constructor(context: RecommendationContext, deps: RecommendationEngineDeps = {}) {
    this.context = context;
    this.fetchPageText = deps.fetchPageText;
    this.log = deps.logger ?? logger.withContext({ component: "recommendationEngine" });
  }

  /**
   * Ranked recommendations for a query.
   *
   * Never rejects for an empty catalog, a failed fetch, a missing duration
   * phrase or an unparseable item duration.
   *
   * @throws {RecommendationEngineError} On any other failure
   */
  async getRecommendations(
    query: string,
    options: RecommendationRequestOptions = {},
  ): Promise<Recommendation[]> {
    const maxResults = clampMaxResults(options.maxResults);
    const assembled = await this.assembleQuery(query, options.url);
    const processed = preprocessQuery(assembled);

    const { catalog, index } = this.context;
    if (catalog.length === 0 || !index.isUsable) {
      this.log.debug("No catalog data, returning no recommendations", {
        catalogSize: catalog.length,
      });
      return [];
    }

    try {
      const ranked = rankBySimilarity(index.vectorize(processed), index.vectors);
      const maxDuration = extractDuration(processed);
      const recommendations = this.selectTop(ranked, maxResults, maxDuration);

      this.log.debug("Recommendations computed", {
        maxResults,
        maxDuration,
        returned: recommendations.length,
      });
      return recommendations;
    } catch (err) {
      if (err instanceof RecommendationEngineError) {
        throw err;
      }
      throw new RecommendationEngineError(
        `Failed to compute recommendations: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { cause: err },
      );
    }
  }

  /**
   * Query plus page text when the URL yields any; failures only log
   */
  private async assembleQuery(
    query: string,
    url: string | null | undefined,
  ): Promise<string> {
    if (!url || url.trim() === "" || !this.fetchPageText) {
      return query;
    }

    let pageText: string | null;
    try {
      pageText = await this.fetchPageText(url.trim());
    } catch (err) {
      this.log.warn("Page text fetch failed, ranking on query alone", {
        url,
        ...logger.errorMeta(err),
      });
      return query;
    }

    return pageText ? `${query} ${pageText}` : query;
  }

  private selectTop(
    ranked: readonly RankedCandidate[],
    maxResults: number,
    maxDuration: DurationConstraint,
  ): Recommendation[] {
    const { catalog } = this.context;
    if (ranked.length !== catalog.length) {
      throw new RecommendationEngineError(
        `Vector space has ${ranked.length} rows for ${catalog.length} catalog items`,
      );
    }

    const accepted: Recommendation[] = [];
    for (const candidate of ranked) {
      const item = catalog[candidate.index];
      if (maxDuration !== null && parseItemDuration(item.duration) > maxDuration) {
        continue;
      }
      accepted.push(this.toRecommendation(candidate));
      if (accepted.length >= maxResults) {
        break;
      }
    }

    if (accepted.length === 0 && ranked.length > 0) {
      this.log.info("No item fits the duration limit, returning best match", {
        maxDuration,
      });
      return [this.toRecommendation(ranked[0])];
    }

    return accepted;
  }

  private toRecommendation(candidate: RankedCandidate): Recommendation {
    return {
      ...this.context.catalog[candidate.index],
      similarity: roundSimilarity(candidate.score),
    };
  }
}
