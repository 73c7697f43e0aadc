// Speech Proficiency Scorer - Word Error Rate
// Compares the transcript against an optional reference transcript supplied
// by the caller.
//
// WER = (substitutions + insertions + deletions) / reference word count,
// computed as a word-level Levenshtein distance. Tokens are whitespace-split
// and compared exactly; no case folding or punctuation stripping.

import type { Maybe } from "./types.js";
import { ABSENT, present } from "./utils/maybe.js";

function tokenize(text: string): string[] {
  const trimmed = text.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

/**
 * Minimum number of word edits turning `reference` into `hypothesis`.
 * Two-row dynamic programming; O(n·m) time, O(m) space.
 */
export function wordEditDistance(reference: readonly string[], hypothesis: readonly string[]): number {
  let previous = Array.from({ length: hypothesis.length + 1 }, (_, j) => j);

  for (let i = 1; i <= reference.length; i++) {
    const current = [i];
    for (let j = 1; j <= hypothesis.length; j++) {
      const substitution = previous[j - 1] + (reference[i - 1] === hypothesis[j - 1] ? 0 : 1);
      const deletion = previous[j] + 1;
      const insertion = current[j - 1] + 1;
      current.push(Math.min(substitution, deletion, insertion));
    }
    previous = current;
  }

  return previous[hypothesis.length];
}

/**
 * Word error rate of `hypothesis` against `reference`.
 *
 * Absent when the reference has no words (the rate is undefined). The value
 * can exceed 1 when the hypothesis inserts many words; the WER penalty clamps.
 */
export function wordErrorRate(reference: string, hypothesis: string): Maybe<number> {
  const referenceTokens = tokenize(reference);
  if (referenceTokens.length === 0) {
    return ABSENT;
  }

  const distance = wordEditDistance(referenceTokens, tokenize(hypothesis));
  return present(distance / referenceTokens.length);
}
