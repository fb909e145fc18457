/**
 * Catalog configuration constants
 */

/**
 * Default path to the catalog JSON file, relative to the working directory
 */
export const CATALOG_PATH = "data/assessments.json";

/**
 * Catalog fields that must be present as non-empty strings
 */
export const REQUIRED_CATALOG_FIELDS = [
  "name",
  "url",
  "remote_testing",
  "adaptive_support",
  "duration",
  "test_type",
] as const;
