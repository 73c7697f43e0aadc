// Speech Proficiency Scorer - Penalty Normalizer
// Maps raw signals onto a common [0, 1] penalty scale (0 = no deduction,
// 1 = maximum deduction) with calibrated piecewise-linear curves.
// Every function here is total: bad or missing input means zero penalty.

import type { Maybe } from "./types.js";

// ─── Calibration ────────────────────────────────────────────────────────────────

/** Grammar errors per 100 words at which the penalty saturates. */
export const MAX_GRAMMAR_ERRORS_PER_100 = 12;

/** Fillers per 100 words at which the penalty saturates. */
export const MAX_FILLERS_PER_100 = 8;

/** Word error rate at which the penalty saturates. */
export const MAX_WER = 0.35;

/** Ideal speaking-rate band (inclusive), in words per minute. */
export const IDEAL_WPM_MIN = 110;
export const IDEAL_WPM_MAX = 170;

/** Rates at or beyond these carry the full fluency penalty. */
export const VERY_SLOW_WPM = 60;
export const VERY_FAST_WPM = 220;

export function clamp01(x: number): number {
  return Math.max(0, Math.min(1, x));
}

// ─── Rate-based penalties ───────────────────────────────────────────────────────

/** Per-100-word rate mapped linearly onto [0, 1], saturating at `threshold`. */
function ratePenalty(count: number, wordCount: number, threshold: number): number {
  if (wordCount <= 0) {
    return 0;
  }
  const per100 = (count / wordCount) * 100;
  return clamp01(per100 / threshold);
}

/**
 * Grammar error rate (errors per 100 words) as a penalty.
 * 0 errors → 0, 6/100 → 0.5, 12/100 and above → 1.
 */
export function normalizeGrammarErrors(errorCount: number, wordCount: number): number {
  return ratePenalty(errorCount, wordCount, MAX_GRAMMAR_ERRORS_PER_100);
}

/**
 * Filler rate (fillers per 100 words) as a penalty.
 * 0 fillers → 0, 4/100 → 0.5, 8/100 and above → 1.
 */
export function normalizeFillers(fillerCount: number, wordCount: number): number {
  return ratePenalty(fillerCount, wordCount, MAX_FILLERS_PER_100);
}

// ─── WER ────────────────────────────────────────────────────────────────────────

/**
 * Word error rate as a penalty. No reference transcript (absent) and
 * negative rates both mean no penalty.
 */
export function normalizeWer(wer: Maybe<number>): number {
  if (wer.kind === "absent" || wer.value < 0) {
    return 0;
  }
  return clamp01(wer.value / MAX_WER);
}

// ─── Fluency ────────────────────────────────────────────────────────────────────

/**
 * V-shaped speaking-rate penalty around the ideal band:
 *
 *   wpm ≤ 60        → 1
 *   60 < wpm < 110  → linear 1 → 0
 *   110 ≤ wpm ≤ 170 → 0
 *   170 < wpm < 220 → linear 0 → 1
 *   wpm ≥ 220       → 1
 *
 * Absent or non-positive rates carry no penalty.
 */
export function fluencyPenalty(wpm: Maybe<number>): number {
  if (wpm.kind === "absent" || wpm.value <= 0) {
    return 0;
  }

  const rate = wpm.value;

  if (rate < IDEAL_WPM_MIN) {
    return clamp01((IDEAL_WPM_MIN - rate) / (IDEAL_WPM_MIN - VERY_SLOW_WPM));
  }

  if (rate > IDEAL_WPM_MAX) {
    return clamp01((rate - IDEAL_WPM_MAX) / (VERY_FAST_WPM - IDEAL_WPM_MAX));
  }

  return 0;
}
