/**
 * Recommendation public API
 */

export {
  RecommendationEngine,
  RecommendationEngineError,
  clampMaxResults,
  roundSimilarity,
} from "./recommendationEngine";
export type { RecommendationEngineDeps } from "./recommendationEngine";
export {
  buildRecommendationContext,
  initializeRecommendationContext,
  compositeText,
} from "./context";
