/**
 * Evaluator: Recall@K and AP@K against a small labeled query set
 */

import type {
  CatalogItem,
  EvaluationCase,
  QueryEvaluation,
  Recommender,
  SystemEvaluation,
} from "@/types";
import {
  DEFAULT_EVALUATION_K,
  SYSTEM_EVALUATION_MAX_RESULTS,
} from "@/constants/evaluation";
import { computeApAtK, computeRecallAtK } from "./metrics";

export class Evaluator {
  private readonly testCases: readonly EvaluationCase[];

  constructor(testCases: readonly EvaluationCase[]) {
    this.testCases = testCases;
  }

  get size(): number {
    return this.testCases.length;
  }

  /**
   * First labeled case whose query contains, or is contained in, the given
   * query (case-insensitive). An empty query matches the first case.
   */
  findTestCase(query: string): EvaluationCase | undefined {
    const lowered = query.toLowerCase();
    return this.testCases.find((testCase) => {
      const labeled = testCase.query.toLowerCase();
      return labeled.includes(lowered) || lowered.includes(labeled);
    });
  }

  evaluateRecommendations(
    query: string,
    recommendations: readonly Pick<CatalogItem, "name">[],
    k: number = DEFAULT_EVALUATION_K,
  ): QueryEvaluation {
    const testCase = this.findTestCase(query);
    if (!testCase) {
      return { recallAtK: 0, apAtK: 0, hasTestData: false };
    }

    return {
      recallAtK: computeRecallAtK(recommendations, testCase.relevantAssessments, k),
      apAtK: computeApAtK(recommendations, testCase.relevantAssessments, k),
      hasTestData: true,
    };
  }

  /**
   * Run every labeled query through the recommender and average the metrics
   */
  async evaluateSystem(
    recommender: Recommender,
    k: number = DEFAULT_EVALUATION_K,
  ): Promise<SystemEvaluation> {
    const recalls: number[] = [];
    const averagePrecisions: number[] = [];

    for (const testCase of this.testCases) {
      const recommendations = await recommender.getRecommendations(
        testCase.query,
        { maxResults: SYSTEM_EVALUATION_MAX_RESULTS },
      );
      recalls.push(
        computeRecallAtK(recommendations, testCase.relevantAssessments, k),
      );
      averagePrecisions.push(
        computeApAtK(recommendations, testCase.relevantAssessments, k),
      );
    }

    return {
      meanRecallAtK: mean(recalls),
      meanApAtK: mean(averagePrecisions),
      k,
      numTestCases: this.testCases.length,
    };
  }
}

function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}
