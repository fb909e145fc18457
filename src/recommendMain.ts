/**
 * Recommendation CLI: prints ranked assessments for a query as JSON
 *
 * Usage:
 *   npm run recommend -- "Java developer, 40 minutes max"
 *   npm run recommend -- "Sales graduate" --url https://jobs.example.com/123 --max 5
 *
 * Environment variables:
 *   - CATALOG_SOURCE, CATALOG_PATH, DB_PATH: where the catalog is read from
 *   - URL_FETCH_TIMEOUT_MS, URL_FETCH_MAX_ATTEMPTS: page fetch bounds
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { parseArgs } from "util";
import { loadConfig } from "./config";
import { createPageTextFetcher } from "./clients/pageText";
import {
  RecommendationEngine,
  initializeRecommendationContext,
} from "./recommendation";
import * as logger from "./logger";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      url: { type: "string" },
      max: { type: "string" },
    },
  });

  const query = positionals.join(" ").trim();
  if (query === "") {
    logger.error("Missing query", {
      usage: 'recommend "<query>" [--url <url>] [--max <1-10>]',
    });
    process.exit(1);
  }

  const config = loadConfig();
  const context = initializeRecommendationContext(config);
  const engine = new RecommendationEngine(context, {
    fetchPageText: createPageTextFetcher(config.urlFetch),
  });

  const recommendations = await engine.getRecommendations(query, {
    url: values.url,
    maxResults: values.max !== undefined ? Number(values.max) : undefined,
  });

  process.stdout.write(
    JSON.stringify(
      { recommendations, count: recommendations.length },
      null,
      2,
    ) + "\n",
  );
}

main().catch((err: unknown) => {
  logger.error("Fatal error", logger.errorMeta(err));
  process.exit(1);
});
