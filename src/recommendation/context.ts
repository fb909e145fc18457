/**
 * Recommendation context: the read-only state shared by every request
 *
 * Built once at startup: the catalog is frozen and the lexical index is
 * fitted over it. Nothing here is written after construction, so concurrent
 * requests can share one context without locking.
 */

import type { AppConfig, CatalogItem, RecommendationContext } from "@/types";
import { LexicalIndex } from "@/retrieval";
import { loadCatalog } from "@/catalog";
import * as logger from "@/logger";

/**
 * Text a catalog item is indexed by: name, test type and description
 */
export function compositeText(item: CatalogItem): string {
  return `${item.name} ${item.test_type} ${item.description ?? ""}`;
}

export function buildRecommendationContext(
  items: readonly CatalogItem[],
): RecommendationContext {
  const catalog = Object.freeze(items.map((item) => Object.freeze({ ...item })));
  const index = new LexicalIndex().fit(catalog.map(compositeText));

  if (catalog.length > 0 && !index.isUsable) {
    logger.warn("Catalog produced an empty vocabulary; no recommendations possible", {
      catalogSize: catalog.length,
    });
  } else {
    logger.info("Recommendation context ready", {
      catalogSize: catalog.length,
      vocabularySize: index.isUsable ? index.vocabularySize : 0,
    });
  }

  return Object.freeze({ catalog, index });
}

/**
 * Load the configured catalog and build the context.
 *
 * A catalog that cannot be loaded is logged and replaced by an empty one:
 * the service still starts and answers every request with no results.
 */
export function initializeRecommendationContext(
  config: AppConfig,
): RecommendationContext {
  let items: CatalogItem[];
  try {
    items = loadCatalog(config);
  } catch (err) {
    logger.error("Could not load catalog, continuing with an empty catalog", {
      source: config.catalogSource,
      path: config.catalogSource === "file" ? config.catalogPath : undefined,
      ...logger.errorMeta(err),
    });
    items = [];
  }

  return buildRecommendationContext(items);
}
