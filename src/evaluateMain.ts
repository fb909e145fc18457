/**
 * Evaluation CLI: scores the engine against the labeled query set
 * and records the run in SQLite
 *
 * Usage:
 *   npm run db:migrate
 *   npm run evaluate -- --k 3
 */

import "dotenv/config";
import { parseArgs } from "util";
import { loadConfig } from "./config";
import {
  RecommendationEngine,
  initializeRecommendationContext,
} from "./recommendation";
import { Evaluator, loadEvaluationSet } from "./evaluation";
import {
  closeDb,
  createEvaluationRun,
  listRecentEvaluationRuns,
  openDb,
  runMigrations,
} from "./db";
import {
  DEFAULT_EVALUATION_K,
  RECENT_EVALUATION_RUNS_LIMIT,
} from "./constants";
import * as logger from "./logger";

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      k: { type: "string" },
    },
  });

  const k = values.k !== undefined ? Number(values.k) : DEFAULT_EVALUATION_K;
  if (!Number.isInteger(k) || k < 1) {
    logger.error("--k must be a positive integer", { k: values.k });
    process.exit(1);
  }

  const config = loadConfig();
  const context = initializeRecommendationContext(config);
  // Page fetching is irrelevant here: labeled cases carry no URLs
  const engine = new RecommendationEngine(context);
  const evaluator = new Evaluator(loadEvaluationSet(config.evaluationSetPath));

  const result = await evaluator.evaluateSystem(engine, k);
  logger.info("Evaluation finished", { ...result });

  runMigrations();
  openDb();
  try {
    const runId = createEvaluationRun({
      k: result.k,
      mean_recall_at_k: result.meanRecallAtK,
      map_at_k: result.meanApAtK,
      num_test_cases: result.numTestCases,
      catalog_size: context.catalog.length,
    });
    logger.info("Evaluation run recorded", { runId });

    process.stdout.write(
      JSON.stringify(
        {
          result,
          recentRuns: listRecentEvaluationRuns(RECENT_EVALUATION_RUNS_LIMIT),
        },
        null,
        2,
      ) + "\n",
    );
  } finally {
    closeDb();
  }
}

main().catch((err: unknown) => {
  logger.error("Fatal error", logger.errorMeta(err));
  process.exit(1);
});
