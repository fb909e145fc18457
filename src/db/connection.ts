/**
 * SQLite database connection
 *
 * One process-wide connection, opened lazily. The catalog is read from it
 * once at startup; evaluation runs are the only rows written at run time.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

const MEMORY_DB = ":memory:";

let db: Database.Database | null = null;

/**
 * Resolve the database path: explicit argument, then DB_PATH, then data/app.db
 */
function resolveDbPath(explicitPath?: string): string {
  const dbPath =
    explicitPath || process.env.DB_PATH || join(process.cwd(), "data", "app.db");

  if (dbPath !== MEMORY_DB) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  return dbPath;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  const resolved = resolveDbPath(dbPath);
  db = new Database(resolved);

  db.pragma("foreign_keys = ON");
  if (resolved !== MEMORY_DB) {
    db.pragma("journal_mode = WAL");
  }

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get current database connection (must be opened first)
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a connection into the singleton.
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
