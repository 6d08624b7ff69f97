/**
 * Scoring configuration constants
 *
 * Axis weights live in data/patterns.json with their rules; only the
 * score range and the acceptance threshold are defined here.
 */

/**
 * Minimum allowed score (inclusive).
 */
export const MIN_RELEVANCE_SCORE = 0;

/**
 * Maximum allowed score (inclusive). Raw sums above this saturate.
 */
export const MAX_RELEVANCE_SCORE = 100;

/**
 * Minimum score for a document to be accepted as a funding announcement.
 *
 * Documents scoring exactly this value are accepted.
 */
export const DEFAULT_RELEVANCE_THRESHOLD = 50;
