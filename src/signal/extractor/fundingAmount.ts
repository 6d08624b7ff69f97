/**
 * Funding amount extraction and normalization
 *
 * Handles formats like:
 * - $10M, £5m, €20B (symbol-prefixed)
 * - 10 million dollars, 5 million pounds (spelled-out)
 *
 * Output is always "$<amount><K|M|B>". The source currency symbol is
 * not preserved, only the magnitude and the scale letter.
 */

import type { PatternRegistry } from "@/types";
import {
  AMOUNT_OUTPUT_SYMBOL,
  AMOUNT_SCALE_LETTERS,
  UNKNOWN_FIELD,
} from "@/constants/classification";
import { AMOUNT_GROUP, AMOUNT_UNIT_GROUP } from "@/constants/patterns";
import * as logger from "@/logger";

/**
 * Maps a unit token to its scale letter by its leading character
 * (k → K, m → M, b → B). Unknown units keep their upper-cased initial.
 *
 * @example
 * normalizeAmountUnit("million") // "M"
 * normalizeAmountUnit("B") // "B"
 */
export function normalizeAmountUnit(unit: string): string {
  const initial = unit.charAt(0).toLowerCase();
  return AMOUNT_SCALE_LETTERS[initial] ?? initial.toUpperCase();
}

/**
 * Extracts the first funding amount in registry pattern order,
 * or UNKNOWN_FIELD.
 *
 * @example
 * extractFundingAmount("raised €20 million", registry) // "$20M"
 */
export function extractFundingAmount(
  text: string,
  registry: PatternRegistry,
): string {
  for (const { id, pattern } of registry.amountPatterns) {
    const groups = pattern.exec(text)?.groups;
    const amount = groups?.[AMOUNT_GROUP];
    const unit = groups?.[AMOUNT_UNIT_GROUP];

    if (amount && unit) {
      const result = `${AMOUNT_OUTPUT_SYMBOL}${amount}${normalizeAmountUnit(unit)}`;
      logger.debug("Extracted funding amount", {
        fundingAmount: result,
        patternId: id,
      });
      return result;
    }
  }

  return UNKNOWN_FIELD;
}
