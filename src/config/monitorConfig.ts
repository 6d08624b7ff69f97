/**
 * Monitor configuration — environment variables resolved once at startup
 *
 * Environment variables:
 *   - RELEVANCE_THRESHOLD: integer 0-100 (default 50)
 *   - PATTERNS_PATH: pattern registry JSON (default data/patterns.json)
 *   - DOCUMENTS_PATH: documents JSON read by the file source (default data/documents.json)
 *   - DIGEST_TYPE: daily | weekly (default daily)
 *   - DIGEST_OUTPUT_DIR: where rendered digests are written (default data/digests)
 *   - CLEANUP_DAYS: integer 1-36500 (default 90)
 *   - DB_PATH: SQLite database file, or :memory: (default data/app.db)
 *
 * LOG_LEVEL is read by the logger module directly.
 */

import type { DigestType, MonitorConfig } from "@/types";
import {
  DEFAULT_RELEVANCE_THRESHOLD,
  MAX_RELEVANCE_SCORE,
  MIN_RELEVANCE_SCORE,
} from "@/constants/scoring";
import { PATTERNS_PATH } from "@/constants/patterns";
import { DEFAULT_DIGEST_OUTPUT_DIR } from "@/constants/digest";
import {
  DEFAULT_CLEANUP_DAYS,
  DEFAULT_DB_PATH,
  DEFAULT_DOCUMENTS_PATH,
  MAX_CLEANUP_DAYS,
} from "@/constants/runner";

/**
 * Error thrown when an environment variable holds an invalid value.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = "ConfigError";
  }
}

function readString(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: string,
): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const value = env[name]?.trim();
  if (!value) {
    return fallback;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  const parsed = Number(value);
  if (parsed < min || parsed > max) {
    throw new ConfigError(
      `${name} must be between ${min} and ${max}, got ${parsed}`,
    );
  }
  return parsed;
}

function readDigestType(env: NodeJS.ProcessEnv): DigestType {
  const value = readString(env, "DIGEST_TYPE", "daily").toLowerCase();
  if (value !== "daily" && value !== "weekly") {
    throw new ConfigError(
      `DIGEST_TYPE must be "daily" or "weekly", got "${value}"`,
    );
  }
  return value;
}

/**
 * Resolves the monitor configuration from environment variables.
 *
 * @throws {ConfigError} On the first invalid value
 */
export function loadMonitorConfig(
  env: NodeJS.ProcessEnv = process.env,
): MonitorConfig {
  return Object.freeze({
    relevanceThreshold: readInteger(
      env,
      "RELEVANCE_THRESHOLD",
      DEFAULT_RELEVANCE_THRESHOLD,
      MIN_RELEVANCE_SCORE,
      MAX_RELEVANCE_SCORE,
    ),
    patternsPath: readString(env, "PATTERNS_PATH", PATTERNS_PATH),
    documentsPath: readString(env, "DOCUMENTS_PATH", DEFAULT_DOCUMENTS_PATH),
    digestType: readDigestType(env),
    digestOutputDir: readString(
      env,
      "DIGEST_OUTPUT_DIR",
      DEFAULT_DIGEST_OUTPUT_DIR,
    ),
    cleanupDays: readInteger(
      env,
      "CLEANUP_DAYS",
      DEFAULT_CLEANUP_DAYS,
      1,
      MAX_CLEANUP_DAYS,
    ),
    dbPath: readString(env, "DB_PATH", DEFAULT_DB_PATH),
  });
}
