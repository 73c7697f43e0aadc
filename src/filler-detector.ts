// Speech Proficiency Scorer - Filler Detector
// Counts verbal disfluencies ("um", "you know", ...) in a transcript.
//
// Discourse words such as "like", "so" and "just" are always counted, even
// where they carry lexical meaning. The detector does no disambiguation.

import type { FillerDetection } from "./types.js";

// ─── Pattern Definitions ────────────────────────────────────────────────────────

/**
 * Ordered filler terms (regex fragments). Multi-word phrases come first so
 * that results for a phrase are reported as one unit.
 *
 * Order is observable: occurrences are reported pattern by pattern.
 */
export const FILLER_TERMS: readonly string[] = [
  // Multi-word fillers
  "you know",
  "i mean",
  "kind of",
  "kinda",
  "sort of",
  "sorta",
  "you see",
  "let me see",
  "let's see",

  // Single-word fillers
  "um+", // um, umm, ummm
  "uh+", // uh, uhh
  "erm+",
  "hmm+",
  "ah+",
  "oh+",
  "like",
  "basically",
  "actually",
  "literally",
  "well",
  "so",
  "just",
];

// `\b` only knows ASCII word characters; these bounds also treat accented
// and non-Latin letters as part of a word ("ahí" holds no "ah").
const WORD_START = "(?<![\\p{L}\\p{N}_])";
const WORD_END = "(?![\\p{L}\\p{N}_])";

export const FILLER_PATTERNS: readonly RegExp[] = FILLER_TERMS.map(
  (term) => new RegExp(`${WORD_START}${term}${WORD_END}`, "gu"),
);

const WHITESPACE_RUN = /\s+/g;

/**
 * Detect filler words and phrases.
 *
 * Matching runs on a lower-cased, whitespace-collapsed copy of the text.
 * Each pattern scans the whole text independently and its matches are
 * appended in pattern order, so `occurrences` is not in text order.
 */
export function detectFillers(text: string): FillerDetection {
  if (!text || text.trim().length === 0) {
    return { count: 0, occurrences: [] };
  }

  const matchText = text.toLowerCase().trim().replace(WHITESPACE_RUN, " ");

  const occurrences: string[] = [];
  for (const pattern of FILLER_PATTERNS) {
    const matches = matchText.match(pattern);
    if (matches) {
      occurrences.push(...matches);
    }
  }

  return { count: occurrences.length, occurrences };
}
