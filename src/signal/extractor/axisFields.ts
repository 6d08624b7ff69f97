/**
 * Axis-driven field extraction: stage, location, industry
 *
 * These fields reuse the scoring rules, so extraction follows the same
 * priority order as scoring. How a hit renders is declared per rule:
 * - Stage: label ("Series A")
 * - Location: literal matched substring ("London", not "UK")
 * - Industry: label for Fintech/SaaS, capitalized match for generic tech
 */

import type { PatternRegistry, RuleMatch, SignalAxis } from "@/types";
import { UNKNOWN_FIELD } from "@/constants/classification";
import { findFirstMatch, rulesForAxis } from "@/patterns/registry";
import { capitalize } from "@/utils/text/textCleanup";
import * as logger from "@/logger";

/**
 * Renders a rule hit according to the rule's extract mode.
 */
export function renderRuleMatch(hit: RuleMatch): string {
  switch (hit.rule.extract) {
    case "label":
      return hit.rule.label;
    case "match":
      return hit.matched;
    case "capitalizedMatch":
      return capitalize(hit.matched);
  }
}

function extractFromAxis(
  axis: SignalAxis,
  text: string,
  registry: PatternRegistry,
): string {
  const hit = findFirstMatch(rulesForAxis(registry, axis), text);
  if (!hit) {
    return UNKNOWN_FIELD;
  }

  const value = renderRuleMatch(hit);
  logger.debug(`Extracted ${axis}`, { value, ruleId: hit.rule.id });
  return value.length > 0 ? value : UNKNOWN_FIELD;
}

export function extractFundingStage(
  text: string,
  registry: PatternRegistry,
): string {
  return extractFromAxis("stage", text, registry);
}

export function extractLocation(
  text: string,
  registry: PatternRegistry,
): string {
  return extractFromAxis("location", text, registry);
}

export function extractIndustry(
  text: string,
  registry: PatternRegistry,
): string {
  return extractFromAxis("industry", text, registry);
}
