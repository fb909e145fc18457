/**
 * Catalog loading
 *
 * Reads the assessment catalog from its configured source and validates it.
 * Loading is fail-fast; deciding what an unreadable catalog means is left
 * to the caller (see initializeRecommendationContext).
 */

import * as fs from "fs";
import * as path from "path";
import type { AppConfig, CatalogItem } from "@/types";
import { validateCatalogItems } from "@/utils/catalogValidation";
import { listAssessments } from "@/db/repos/assessmentsRepo";
import { openDb, closeDb } from "@/db/connection";

/**
 * Error thrown when the catalog source cannot be read or parsed
 */
export class CatalogLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Catalog load failed: ${message}`, options);
    this.name = "CatalogLoadError";
  }
}

/**
 * Loads the catalog from a JSON file.
 *
 * @param catalogPath - Path relative to the working directory (or absolute)
 * @throws {CatalogLoadError} If the file cannot be read or is not JSON
 * @throws {CatalogValidationError} If the content is not a valid catalog
 */
export function loadCatalogFromFile(catalogPath: string): CatalogItem[] {
  const resolved = path.resolve(process.cwd(), catalogPath);

  let jsonContent: string;
  try {
    jsonContent = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new CatalogLoadError(`cannot read ${resolved}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonContent);
  } catch (err) {
    throw new CatalogLoadError(`${resolved} is not valid JSON`, { cause: err });
  }

  return validateCatalogItems(raw);
}

/**
 * Loads the catalog from the assessments table of an already opened database,
 * in stored position order.
 */
export function loadCatalogFromDb(): CatalogItem[] {
  const rows = listAssessments();
  return validateCatalogItems(
    rows.map((row) => ({
      name: row.name,
      url: row.url,
      remote_testing: row.remote_testing,
      adaptive_support: row.adaptive_support,
      duration: row.duration,
      test_type: row.test_type,
      ...(row.description !== null ? { description: row.description } : {}),
    })),
  );
}

/**
 * Loads the catalog from the source named in config.
 *
 * For the "db" source the connection is opened and closed here; the catalog
 * is read once and never touched again.
 */
export function loadCatalog(config: AppConfig): CatalogItem[] {
  if (config.catalogSource === "file") {
    return loadCatalogFromFile(config.catalogPath);
  }

  openDb();
  try {
    return loadCatalogFromDb();
  } finally {
    closeDb();
  }
}
