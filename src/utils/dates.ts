/**
 * Timestamp normalization
 *
 * Stored timestamps are ISO 8601 UTC strings so SQLite can compare them
 * as text. Sources hand over whatever their feed carries (ISO, RFC 822).
 */

/**
 * Parses a date string and renders it as ISO 8601 UTC, or null when
 * the value is missing or not a date.
 *
 * @example
 * toIsoTimestamp("Sun, 01 Mar 2026 00:00:00 GMT") // "2026-03-01T00:00:00.000Z"
 * toIsoTimestamp("yesterday") // null
 */
export function toIsoTimestamp(
  value: string | null | undefined,
): string | null {
  if (!value || value.trim().length === 0) {
    return null;
  }
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}
