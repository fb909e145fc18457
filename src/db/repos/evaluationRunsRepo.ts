/**
 * Evaluation runs repository
 *
 * Data access layer for evaluation_runs table.
 */

import type { EvaluationRun, EvaluationRunInput } from "@/types";
import { getDb } from "../connection";

/**
 * Record a finished system evaluation
 * Returns the run id
 */
export function createEvaluationRun(input: EvaluationRunInput): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO evaluation_runs (k, mean_recall_at_k, map_at_k, num_test_cases, catalog_size)
    VALUES (?, ?, ?, ?, ?)
  `,
    )
    .run(
      input.k,
      input.mean_recall_at_k,
      input.map_at_k,
      input.num_test_cases,
      input.catalog_size,
    );

  return Number(result.lastInsertRowid);
}

/**
 * Get run by id
 */
export function getEvaluationRunById(id: number): EvaluationRun | undefined {
  const db = getDb();
  return db.prepare("SELECT * FROM evaluation_runs WHERE id = ?").get(id) as
    | EvaluationRun
    | undefined;
}

/**
 * Most recent runs first
 */
export function listRecentEvaluationRuns(limit: number): EvaluationRun[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM evaluation_runs ORDER BY id DESC LIMIT ?")
    .all(limit) as EvaluationRun[];
}
