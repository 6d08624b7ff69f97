/**
 * Registry lookups shared by the scorer and the field extractor
 */

import type {
  ExtractionPattern,
  PatternRegistry,
  PatternRule,
  RuleMatch,
  SignalAxis,
} from "@/types";

/**
 * Rules of one axis, in priority order.
 */
export function rulesForAxis(
  registry: PatternRegistry,
  axis: SignalAxis,
): readonly PatternRule[] {
  return registry.axes[axis];
}

/**
 * Evaluates rules in order and returns the first that matches.
 * Later rules are never tried once one matches.
 */
export function findFirstMatch(
  rules: readonly PatternRule[],
  text: string,
): RuleMatch | undefined {
  for (const rule of rules) {
    const match = rule.pattern.exec(text);
    if (match) {
      return { rule, matched: match[0] };
    }
  }
  return undefined;
}

/**
 * Evaluates extraction patterns in order and returns the first match
 * with the pattern that produced it.
 */
export function findFirstPatternMatch(
  patterns: readonly ExtractionPattern[],
  text: string,
): { pattern: ExtractionPattern; match: RegExpExecArray } | undefined {
  for (const pattern of patterns) {
    const match = pattern.pattern.exec(text);
    if (match) {
      return { pattern, match };
    }
  }
  return undefined;
}
