/**
 * Ranking metrics over recommendation names
 *
 * Relevance is exact name equality against the labeled list.
 */

import type { CatalogItem } from "@/types";

type Named = Pick<CatalogItem, "name">;

/**
 * Share of relevant items found in the top k.
 * 1.0 when nothing is labeled relevant.
 */
export function computeRecallAtK(
  recommendations: readonly Named[],
  relevantAssessments: readonly string[],
  k: number,
): number {
  if (relevantAssessments.length === 0) {
    return 1.0;
  }

  const relevant = new Set(relevantAssessments);
  const found = recommendations
    .slice(0, k)
    .filter((rec) => relevant.has(rec.name)).length;

  return found / relevantAssessments.length;
}

/**
 * Average precision at k: precision at each relevant position in the top k,
 * summed and divided by min(|relevant|, k).
 * 1.0 when nothing is labeled relevant, 0 when none is found.
 */
export function computeApAtK(
  recommendations: readonly Named[],
  relevantAssessments: readonly string[],
  k: number,
): number {
  if (relevantAssessments.length === 0) {
    return 1.0;
  }

  const relevant = new Set(relevantAssessments);
  let precisionSum = 0;
  let found = 0;

  recommendations.slice(0, k).forEach((rec, position) => {
    if (relevant.has(rec.name)) {
      found += 1;
      precisionSum += found / (position + 1);
    }
  });

  if (found === 0) {
    return 0;
  }
  return precisionSum / Math.min(relevantAssessments.length, k);
}
