/**
 * Catalog type definitions
 *
 * The catalog is the fixed, ordered list of recommendable assessments.
 * Position in the list is significant: vector-space row i always
 * corresponds to catalog item i.
 */

/**
 * A single assessment as it appears in the catalog JSON or the
 * assessments table.
 */
export type CatalogItem = {
  /** Display name, unique within the catalog */
  readonly name: string;
  /** Product page URL */
  readonly url: string;
  /** Remote testing label (e.g. "Yes" / "No") */
  readonly remote_testing: string;
  /** Adaptive / IRT support label */
  readonly adaptive_support: string;
  /** Free text with an embedded minute count, e.g. "40 minutes" */
  readonly duration: string;
  /** Category label, e.g. "Knowledge & Skills" */
  readonly test_type: string;
  readonly description?: string;
};

/**
 * Ordered, index-stable catalog
 */
export type Catalog = readonly CatalogItem[];

/**
 * Where the catalog is loaded from at startup
 */
export type CatalogSource = "file" | "db";
