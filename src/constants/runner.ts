/**
 * Monitor run constants
 */

/**
 * Articles processed longer ago than this are deleted (cascading to
 * their announcements) at the end of each run.
 */
export const DEFAULT_CLEANUP_DAYS = 90;

/**
 * Upper bound for CLEANUP_DAYS (100 years). The retention cutoff must
 * stay a representable date.
 */
export const MAX_CLEANUP_DAYS = 36500;

/**
 * Default SQLite database file, relative to the project root.
 */
export const DEFAULT_DB_PATH = "data/app.db";

/**
 * Default path of the JSON file read by the document source.
 */
export const DEFAULT_DOCUMENTS_PATH = "data/documents.json";

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
