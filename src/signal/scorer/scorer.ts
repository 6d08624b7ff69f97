/**
 * Relevance scorer
 *
 * Converts a text blob into a bounded relevance score (0-100) with an
 * auditable per-axis breakdown.
 *
 * Scoring rules:
 * - Axes are evaluated independently: funding, stage, location, industry
 * - Within an axis, rules are tried in registry order and only the FIRST
 *   match contributes its weight (UK > EU > ME, Fintech > SaaS > Tech,
 *   a single stage however many stage terms appear)
 * - No match contributes 0; weights are never negative
 * - The sum is clamped to [0, 100]
 *
 * Pure: the result depends only on the text and the registry.
 */

import type {
  AxisContribution,
  PatternRegistry,
  ScoreResult,
  SignalAxis,
} from "@/types";
import { SIGNAL_AXES } from "@/constants/patterns";
import {
  MAX_RELEVANCE_SCORE,
  MIN_RELEVANCE_SCORE,
} from "@/constants/scoring";
import { findFirstMatch, rulesForAxis } from "@/patterns/registry";

/**
 * Scores a single axis: weight of the first matching rule, or 0.
 */
function scoreAxis(
  axis: SignalAxis,
  text: string,
  registry: PatternRegistry,
): AxisContribution {
  const hit = findFirstMatch(rulesForAxis(registry, axis), text);
  if (!hit) {
    return { axis, ruleId: null, matched: null, points: 0 };
  }
  return {
    axis,
    ruleId: hit.rule.id,
    matched: hit.matched,
    points: hit.rule.weight,
  };
}

/**
 * Computes the relevance score of a text blob with its breakdown.
 *
 * Never throws for string input; the empty string scores 0.
 *
 * @param text - Title and description joined (see buildTextBlob)
 * @param registry - Compiled pattern registry
 */
export function scoreText(text: string, registry: PatternRegistry): ScoreResult {
  const axes = SIGNAL_AXES.map((axis) => scoreAxis(axis, text, registry));
  const rawScore = axes.reduce((sum, contribution) => sum + contribution.points, 0);
  const finalScore = Math.max(
    MIN_RELEVANCE_SCORE,
    Math.min(MAX_RELEVANCE_SCORE, rawScore),
  );

  return {
    score: finalScore,
    reasons: {
      rawScore,
      finalScore,
      axes,
    },
  };
}

/**
 * Computes only the relevance score of a text blob.
 */
export function computeScore(text: string, registry: PatternRegistry): number {
  return scoreText(text, registry).score;
}
