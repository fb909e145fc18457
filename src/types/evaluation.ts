/**
 * Evaluation type definitions
 */

/**
 * Labeled query with the assessment names judged relevant
 */
export type EvaluationCase = {
  query: string;
  relevantAssessments: string[];
};

export type QueryEvaluation = {
  recallAtK: number;
  apAtK: number;
  /** False when no labeled case matched the query */
  hasTestData: boolean;
};

export type SystemEvaluation = {
  meanRecallAtK: number;
  meanApAtK: number;
  k: number;
  numTestCases: number;
};
