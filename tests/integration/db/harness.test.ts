/**
 * Test harness smoke test: migrations apply to a fresh temp database
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { applyPendingMigrations } from "@/db";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";

describe("test DB harness", () => {
  let harness: TestDbHarness;

  beforeEach(() => {
    harness = createTestDb();
  });

  afterEach(() => {
    harness.cleanup();
  });

  it("applies every migration in order", () => {
    expect(harness.migrations).toEqual([
      "001_assessments.sql",
      "002_evaluation_runs.sql",
    ]);
  });

  it("creates the expected tables", () => {
    const tables = harness.db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all() as { name: string }[];

    expect(tables.map((row) => row.name)).toEqual([
      "assessments",
      "evaluation_runs",
      "schema_migrations",
    ]);
  });

  it("is a no-op when migrations are already applied", () => {
    expect(applyPendingMigrations(harness.db)).toEqual([]);
  });

  it("removes the database file on cleanup", () => {
    const { dbPath } = harness;
    harness.cleanup();
    expect(existsSync(dbPath)).toBe(false);
    harness = createTestDb();
  });
});
