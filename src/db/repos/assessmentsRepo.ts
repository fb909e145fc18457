/**
 * Assessments repository
 *
 * Data access layer for the assessments table. The table is an alternative
 * catalog source; rows are read back in position order so that the
 * vector-space row/catalog index correspondence holds.
 */

import type { AssessmentRow, CatalogItem } from "@/types";
import { getDb } from "../connection";

/**
 * Replace the stored catalog with the given items, in one transaction.
 *
 * Used by the offline import script only; the running service never writes.
 *
 * @returns Number of rows inserted
 */
export function replaceAssessments(items: readonly CatalogItem[]): number {
  const db = getDb();

  const insert = db.prepare(
    `
    INSERT INTO assessments
      (position, name, url, remote_testing, adaptive_support, duration, test_type, description)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `,
  );

  const transaction = db.transaction((rows: readonly CatalogItem[]) => {
    db.prepare("DELETE FROM assessments").run();
    rows.forEach((item, position) => {
      insert.run(
        position,
        item.name,
        item.url,
        item.remote_testing,
        item.adaptive_support,
        item.duration,
        item.test_type,
        item.description ?? null,
      );
    });
  });

  transaction(items);
  return items.length;
}

/**
 * All assessments in catalog order
 */
export function listAssessments(): AssessmentRow[] {
  const db = getDb();
  return db
    .prepare("SELECT * FROM assessments ORDER BY position ASC")
    .all() as AssessmentRow[];
}

export function countAssessments(): number {
  const db = getDb();
  const row = db.prepare("SELECT COUNT(*) AS count FROM assessments").get() as {
    count: number;
  };
  return row.count;
}
