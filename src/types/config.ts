/**
 * Runtime configuration type definitions
 */

import type { DigestType } from "./digest";

/**
 * Monitor configuration resolved from environment variables.
 * Loaded once at startup; immutable afterwards.
 */
export type MonitorConfig = {
  /** Minimum relevance score (inclusive) for a document to be accepted */
  relevanceThreshold: number;
  /** Path to the pattern registry JSON */
  patternsPath: string;
  /** Path to the JSON file read by the document source */
  documentsPath: string;
  digestType: DigestType;
  /** Directory where rendered digests are written */
  digestOutputDir: string;
  /** Articles processed more than this many days ago are deleted */
  cleanupDays: number;
  /** SQLite database file, relative to cwd, or ":memory:" */
  dbPath: string;
};
