/**
 * Integration tests for the evaluation runs repository
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  createEvaluationRun,
  getEvaluationRunById,
  listRecentEvaluationRuns,
} from "@/db";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";

function runInput(k: number) {
  return {
    k,
    mean_recall_at_k: 0.5,
    map_at_k: 0.25,
    num_test_cases: 4,
    catalog_size: 18,
  };
}

describe("evaluationRunsRepo", () => {
  let harness: TestDbHarness;

  beforeEach(() => {
    harness = createTestDb();
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("stores a run and reads it back", () => {
    const id = createEvaluationRun(runInput(3));
    const run = getEvaluationRunById(id);

    expect(run).toMatchObject({ id, ...runInput(3) });
    expect(typeof run?.created_at).toBe("string");
  });

  it("returns undefined for an unknown id", () => {
    expect(getEvaluationRunById(999)).toBeUndefined();
  });

  it("lists the most recent runs first, up to the limit", () => {
    createEvaluationRun(runInput(1));
    createEvaluationRun(runInput(2));
    createEvaluationRun(runInput(3));

    expect(listRecentEvaluationRuns(2).map((run) => run.k)).toEqual([3, 2]);
    expect(listRecentEvaluationRuns(10)).toHaveLength(3);
  });
});
