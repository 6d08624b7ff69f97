/**
 * Runner entrypoint — executes one monitor pass and exits
 *
 * Usage:
 *   npm start
 *
 * Environment variables (see .env.example):
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - DB_PATH, PATTERNS_PATH, DOCUMENTS_PATH, RELEVANCE_THRESHOLD,
 *     DIGEST_TYPE, DIGEST_OUTPUT_DIR, CLEANUP_DAYS: see src/config
 */

import "dotenv/config";
import { loadMonitorConfig } from "./config";
import { loadPatternRegistry } from "./patterns";
import { openDb, closeDb, runMigrations } from "./db";
import { JsonFileDocumentSource } from "./documentSources";
import { FileDigestSink } from "./digest";
import { runMonitorOnce } from "./orchestration/monitor";
import * as logger from "./logger";

async function main(): Promise<number> {
  // Configuration errors are fatal before any I/O
  const config = loadMonitorConfig();
  const registry = loadPatternRegistry(config.patternsPath);

  logger.info("Starting funding monitor", {
    registryVersion: registry.version,
    threshold: config.relevanceThreshold,
    digestType: config.digestType,
  });

  const db = openDb(config.dbPath);
  try {
    runMigrations(db);

    const summary = await runMonitorOnce({
      source: new JsonFileDocumentSource(config.documentsPath),
      sink: new FileDigestSink(config.digestOutputDir),
      registry,
      config,
    });

    logger.info("Runner finished", { ...summary });
    return 0;
  } finally {
    closeDb();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = 1;
  });
