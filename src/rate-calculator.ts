// Speech Proficiency Scorer - Rate Calculator
// Speaking rate (WPM) and sentence-level statistics.

import type { Maybe, SentenceStats } from "./types.js";
import { ABSENT, present } from "./utils/maybe.js";
import { roundTo } from "./utils.js";

/**
 * Words per minute, rounded to 2 decimals.
 *
 * Absent (not an error) when the duration is zero or negative or the word
 * count is negative: the rate simply isn't computable for that sample.
 */
export function wordsPerMinute(wordCount: number, durationSec: number): Maybe<number> {
  if (durationSec <= 0 || wordCount < 0) {
    return ABSENT;
  }

  return present(roundTo((wordCount / durationSec) * 60, 2));
}

const SENTENCE_TERMINATORS = /[.!?]+/;

const EMPTY_STATS: SentenceStats = {
  sentenceCount: 0,
  avgSentenceLength: 0,
  minSentenceLength: 0,
  maxSentenceLength: 0,
};

/**
 * Basic sentence statistics: sentences are the non-empty pieces between runs
 * of `.`, `!` and `?`; lengths are in whitespace-separated words.
 */
export function sentenceStats(text: string): SentenceStats {
  if (!text || text.trim().length === 0) {
    return EMPTY_STATS;
  }

  const sentences = text
    .split(SENTENCE_TERMINATORS)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  if (sentences.length === 0) {
    return EMPTY_STATS;
  }

  const lengths = sentences.map((s) => s.split(/\s+/).length);
  const total = lengths.reduce((sum, n) => sum + n, 0);

  return {
    sentenceCount: sentences.length,
    avgSentenceLength: roundTo(total / lengths.length, 2),
    minSentenceLength: Math.min(...lengths),
    maxSentenceLength: Math.max(...lengths),
  };
}
