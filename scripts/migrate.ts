/**
 * Applies pending SQL migrations to the database at DB_PATH
 *
 * Usage: npm run migrate
 */

import "dotenv/config";
import { loadMonitorConfig } from "@/config";
import { openDb, closeDb, runMigrations } from "@/db";
import * as logger from "@/logger";

const { dbPath } = loadMonitorConfig();

try {
  const applied = runMigrations(openDb(dbPath));
  logger.info("Migrations complete", { dbPath, applied: applied.length });
} finally {
  closeDb();
}
