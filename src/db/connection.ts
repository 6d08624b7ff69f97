/**
 * SQLite connection holder
 *
 * One process-wide connection, opened by the entry point with the path
 * from MonitorConfig and read by every repository through getDb().
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import * as path from "path";
import * as logger from "@/logger";

const IN_MEMORY = ":memory:";

let db: Database.Database | null = null;

/**
 * Resolves a database path against cwd and creates its directory.
 */
function prepareDbFile(dbPath: string): string {
  if (dbPath === IN_MEMORY) {
    return dbPath;
  }
  const resolved = path.resolve(process.cwd(), dbPath);
  mkdirSync(path.dirname(resolved), { recursive: true });
  return resolved;
}

/**
 * Announcements cascade with their article, so foreign keys are enforced
 * on every connection.
 */
function applyPragmas(connection: Database.Database): void {
  connection.pragma("foreign_keys = ON");
  connection.pragma("journal_mode = WAL");
}

/**
 * Opens the shared connection, or returns it when already open.
 *
 * @param dbPath - File path relative to cwd, or ":memory:"
 */
export function openDb(dbPath: string): Database.Database {
  if (db) {
    return db;
  }

  const file = prepareDbFile(dbPath);
  const connection = new Database(file);
  applyPragmas(connection);
  db = connection;

  logger.debug("Database opened", { path: file });
  return connection;
}

export function closeDb(): void {
  if (!db) {
    return;
  }
  db.close();
  db = null;
}

/**
 * The shared connection. Throws until openDb() (or setDbForTesting) ran.
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb(dbPath) first.");
  }
  return db;
}

/**
 * Swaps the shared connection; tests inject a temp database here.
 *
 * @internal
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
