/**
 * Text cleanup helpers for extracted values
 *
 * Deterministic, locale-independent string transforms. No stemming,
 * no language detection.
 */

/**
 * Collapses every whitespace run to a single space and trims the ends.
 *
 * @example
 * collapseWhitespace("  Acme \t  Corp ") // "Acme Corp"
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Upper-cases the first character and lower-cases the rest.
 *
 * @example
 * capitalize("machine learning") // "Machine learning"
 * capitalize("AI") // "Ai"
 */
export function capitalize(text: string): string {
  if (text.length === 0) {
    return text;
  }
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

/**
 * Cuts text to at most maxLength code points, so a surrogate pair is
 * never split. Shorter text is returned as-is.
 *
 * @example
 * truncate("ab😀c", 3) // "ab😀"
 */
export function truncate(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  return codePoints.length > maxLength
    ? codePoints.slice(0, maxLength).join("")
    : text;
}
