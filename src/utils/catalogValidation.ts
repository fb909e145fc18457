/**
 * Catalog validation module
 *
 * Validates catalog JSON structure and enforces invariants:
 * - Top level is an array of objects
 * - Required fields are non-empty strings
 * - description, when present, is a string
 * - No duplicate names
 *
 * Validation is fail-fast: throws on first error.
 */

import type { CatalogItem } from "@/types";
import { REQUIRED_CATALOG_FIELDS } from "@/constants/catalog";

export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(`Catalog validation failed: ${message}`);
    this.name = "CatalogValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * @throws {CatalogValidationError} If value is not a non-empty string
 */
function validateNonEmptyString(
  value: unknown,
  fieldPath: string,
): asserts value is string {
  if (typeof value !== "string") {
    throw new CatalogValidationError(
      `${fieldPath} must be a string, got ${typeof value}`,
    );
  }
  if (value.trim().length === 0) {
    throw new CatalogValidationError(
      `${fieldPath} cannot be empty or whitespace-only`,
    );
  }
}

function readRequiredString(
  raw: Record<string, unknown>,
  field: (typeof REQUIRED_CATALOG_FIELDS)[number],
  prefix: string,
): string {
  const value = raw[field];
  validateNonEmptyString(value, `${prefix}.${field}`);
  return value;
}

function validateItem(raw: unknown, index: number): CatalogItem {
  const prefix = `items[${index}]`;
  if (!isRecord(raw)) {
    throw new CatalogValidationError(`${prefix} must be an object`);
  }

  const item: CatalogItem = {
    name: readRequiredString(raw, "name", prefix),
    url: readRequiredString(raw, "url", prefix),
    remote_testing: readRequiredString(raw, "remote_testing", prefix),
    adaptive_support: readRequiredString(raw, "adaptive_support", prefix),
    duration: readRequiredString(raw, "duration", prefix),
    test_type: readRequiredString(raw, "test_type", prefix),
  };

  const description = raw.description;
  if (description === undefined || description === null) {
    return item;
  }
  if (typeof description !== "string") {
    throw new CatalogValidationError(
      `${prefix}.description must be a string, got ${typeof description}`,
    );
  }
  return { ...item, description };
}

/**
 * Validates raw catalog data from JSON or the database.
 *
 * An empty array is valid: an empty catalog simply yields no recommendations.
 *
 * @returns Frozen items in input order
 * @throws {CatalogValidationError} On the first invalid item or duplicate name
 */
export function validateCatalogItems(raw: unknown): CatalogItem[] {
  if (!Array.isArray(raw)) {
    throw new CatalogValidationError("Catalog must be an array of items");
  }

  const items = raw.map((entry: unknown, index) =>
    Object.freeze(validateItem(entry, index)),
  );

  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.name)) {
      throw new CatalogValidationError(`Duplicate item name: "${item.name}"`);
    }
    seen.add(item.name);
  }

  return items;
}
