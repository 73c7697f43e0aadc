// Speech Proficiency Scorer - Composite Scorer
// Combines the four normalized penalties into a final 0-100 score and a
// fixed-format, parseable explanation string.

import type { PenaltyBreakdown, PenaltyComponent, ScoreResult } from "./types.js";
import { clamp01 } from "./penalty-normalizer.js";
import { clamp, formatDecimal, roundTo } from "./utils.js";

/** Component weights. They sum to 1.0. */
export const SCORE_WEIGHTS: Readonly<Record<PenaltyComponent, number>> = {
  grammar: 0.35,
  fillers: 0.25,
  wer: 0.2,
  fluency: 0.2,
};

const COMPONENTS: readonly PenaltyComponent[] = ["grammar", "fillers", "wer", "fluency"];

const EXPLANATION_LABELS: Readonly<Record<PenaltyComponent, string>> = {
  grammar: "Grammar",
  fillers: "Fillers",
  wer: "WER",
  fluency: "Fluency",
};

/** Re-clamp every component; callers may hand in out-of-range values. */
function clampPenalties(penalties: PenaltyBreakdown): PenaltyBreakdown {
  return {
    grammar: clamp01(penalties.grammar),
    fillers: clamp01(penalties.fillers),
    wer: clamp01(penalties.wer),
    fluency: clamp01(penalties.fluency),
  };
}

/**
 * Points deducted by one component: penalty × weight × 100, rounded to
 * 1 decimal.
 */
export function componentDeduction(penalties: PenaltyBreakdown, component: PenaltyComponent): number {
  return roundTo(clamp01(penalties[component]) * SCORE_WEIGHTS[component] * 100, 1);
}

/**
 * score = 100 − Σ(weightᵢ × penaltyᵢ) × 100, clamped to [0, 100] and
 * rounded to 2 decimals.
 */
export function calculateFinalScore(penalties: PenaltyBreakdown): number {
  const clamped = clampPenalties(penalties);
  const totalPenalty = COMPONENTS.reduce(
    (sum, component) => sum + clamped[component] * SCORE_WEIGHTS[component],
    0,
  );
  return roundTo(clamp(100 - totalPenalty * 100, 0, 100), 2);
}

/**
 * `Score: {final}/100 | Grammar: -{g} pts | Fillers: -{f} pts | WER: -{w} pts | Fluency: -{fl} pts`
 */
export function generateScoreExplanation(penalties: PenaltyBreakdown, finalScore: number): string {
  const parts = COMPONENTS.map(
    (component) =>
      `${EXPLANATION_LABELS[component]}: -${formatDecimal(componentDeduction(penalties, component))} pts`,
  );
  return [`Score: ${formatDecimal(finalScore)}/100`, ...parts].join(" | ");
}

export function score(penalties: PenaltyBreakdown): ScoreResult {
  const clamped = clampPenalties(penalties);
  const finalScore = calculateFinalScore(clamped);
  return {
    finalScore,
    penalties: clamped,
    explanation: generateScoreExplanation(clamped, finalScore),
  };
}
