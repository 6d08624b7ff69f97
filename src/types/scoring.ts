/**
 * Scoring type definitions
 *
 * Types for the relevance scorer that turns a text blob into a
 * bounded 0-100 score with an auditable per-axis breakdown.
 */

import type { SignalAxis } from "./patterns";

/**
 * Contribution of a single axis to the score.
 *
 * Only the first matching rule of an axis contributes; ruleId is null
 * when no rule of the axis matched.
 */
export type AxisContribution = {
  axis: SignalAxis;
  ruleId: string | null;
  /** Literal matched substring, null when nothing matched */
  matched: string | null;
  points: number;
};

export type ScoreReason = {
  /** Sum of axis points before clamping */
  rawScore: number;
  /** Final score after clamping to [0, MAX_RELEVANCE_SCORE] */
  finalScore: number;
  /** One entry per axis, in scoring order */
  axes: AxisContribution[];
};

export type ScoreResult = {
  /** Relevance score, integer in [0, 100] */
  score: number;
  reasons: ScoreReason;
};
