/**
 * Database type definitions
 *
 * Row shapes for the assessments and evaluation_runs tables.
 */

export type AssessmentRow = {
  id: number;
  position: number;
  name: string;
  url: string;
  remote_testing: string;
  adaptive_support: string;
  duration: string;
  test_type: string;
  description: string | null;
};

export type EvaluationRun = {
  id: number;
  k: number;
  mean_recall_at_k: number;
  map_at_k: number;
  num_test_cases: number;
  catalog_size: number;
  created_at: string;
};

export type EvaluationRunInput = {
  k: number;
  mean_recall_at_k: number;
  map_at_k: number;
  num_test_cases: number;
  catalog_size: number;
};
