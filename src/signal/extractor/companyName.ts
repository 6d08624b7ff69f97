/**
 * Company name extraction from article titles
 *
 * Title patterns are tried in registry order:
 * 1. "<Name> raises/secures/closes/lands ..." (name right before a funding verb)
 * 2. "<Name>, a/an ..." (name followed by an appositive)
 * 3. "<Name> (has) raised/secured ..." (looser, unanchored)
 *
 * The first match wins; its `name` group is cleaned before being returned.
 */

import type { PatternRegistry } from "@/types";
import {
  COMPANY_NAME_TRAILING_PUNCTUATION,
  UNKNOWN_FIELD,
} from "@/constants/classification";
import { COMPANY_NAME_GROUP } from "@/constants/patterns";
import { findFirstPatternMatch } from "@/patterns/registry";
import { collapseWhitespace } from "@/utils/text/textCleanup";
import * as logger from "@/logger";

/**
 * Trims trailing punctuation (. , ; :) and collapses whitespace runs.
 *
 * @example
 * cleanCompanyName("Acme   Corp.") // "Acme Corp"
 */
export function cleanCompanyName(raw: string): string {
  return collapseWhitespace(
    raw.trim().replace(COMPANY_NAME_TRAILING_PUNCTUATION, ""),
  );
}

/**
 * Extracts the company name from a title, or UNKNOWN_FIELD.
 *
 * @param title - Article title only (never the full text blob)
 */
export function extractCompanyName(
  title: string,
  registry: PatternRegistry,
): string {
  const hit = findFirstPatternMatch(registry.companyNamePatterns, title);
  const rawName = hit?.match.groups?.[COMPANY_NAME_GROUP];

  if (!hit || rawName === undefined) {
    logger.debug("Could not extract company name", { title });
    return UNKNOWN_FIELD;
  }

  const name = cleanCompanyName(rawName);
  if (name.length === 0) {
    return UNKNOWN_FIELD;
  }

  logger.debug("Extracted company name", {
    companyName: name,
    patternId: hit.pattern.id,
  });
  return name;
}
