/**
 * Classification constants
 */

/**
 * Sentinel for a field that could not be extracted.
 *
 * Never null or an empty string, so storage and rendering can tell
 * "not found" apart from a value.
 */
export const UNKNOWN_FIELD = "Unknown";

/**
 * Separator placed between title and description when building the text blob.
 */
export const TEXT_BLOB_SEPARATOR = ". ";

/**
 * Maximum description length kept in a classification summary.
 */
export const SUMMARY_MAX_LENGTH = 500;

/**
 * Trailing characters trimmed from extracted company names.
 */
export const COMPANY_NAME_TRAILING_PUNCTUATION = /[.,;:]+$/;

/**
 * Amount unit scale letters, keyed by the unit token's leading character.
 */
export const AMOUNT_SCALE_LETTERS: Record<string, string> = {
  k: "K",
  m: "M",
  b: "B",
};

/**
 * Currency symbol every normalized amount is rendered with.
 */
export const AMOUNT_OUTPUT_SYMBOL = "$";
