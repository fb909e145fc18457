#!/usr/bin/env tsx
/**
 * Load a JSON catalog into the SQLite assessments table
 *
 * Usage:
 *   npm run catalog:import                       # data/assessments.json
 *   npm run catalog:import -- path/to/catalog.json
 */

import "dotenv/config";
import { loadCatalogFromFile } from "@/catalog";
import { CATALOG_PATH } from "@/constants";
import {
  closeDb,
  countAssessments,
  openDb,
  replaceAssessments,
  runMigrations,
} from "@/db";
import * as logger from "@/logger";

function main(): void {
  const catalogPath = process.argv[2] ?? CATALOG_PATH;
  const items = loadCatalogFromFile(catalogPath);

  runMigrations();
  openDb();
  try {
    replaceAssessments(items);
    logger.info("Catalog imported", {
      catalogPath,
      stored: countAssessments(),
    });
  } finally {
    closeDb();
  }
}

try {
  main();
} catch (err) {
  logger.error("Catalog import failed", logger.errorMeta(err));
  process.exit(1);
}
