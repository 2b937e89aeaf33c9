/**
 * SQLite database connection
 *
 * Holds the process-wide connection. Repositories call getDb(); the
 * runner opens and closes it, tests inject their own.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";
import { DB_PATH_ENV, DEFAULT_DB_PATH } from "@/constants/db";

let db: Database.Database | null = null;

/**
 * Get database file path from environment or default
 */
function getDbPath(): string {
  const dbPath = process.env[DB_PATH_ENV] || join(process.cwd(), DEFAULT_DB_PATH);

  // Ensure parent directory exists (skip for :memory:)
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  return dbPath;
}

/**
 * Open database connection with required pragmas
 * Returns existing connection if already open
 */
export function openDb(): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(getDbPath());

  // Structured records reference source_messages
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

/**
 * Close database connection
 */
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
 * Run a function inside a transaction on the current connection.
 * Any throw rolls the whole unit back.
 */
export function withTransaction<T>(fn: () => T): T {
  return getDb().transaction(fn)();
}

/**
 * Set database connection for testing purposes only.
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
