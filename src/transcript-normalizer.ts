// Speech Proficiency Scorer - Transcript Normalizer
// Light cleanup of raw ASR text before any feature extraction runs.
// Casing and punctuation are preserved: the grammar checker depends on them.

const WHITESPACE_RUN = /\s+/g;
const SPACE_BEFORE_PUNCT = /\s+([.,!?;:])/g;

/**
 * Normalize a raw transcript:
 *  1. Collapse whitespace runs (spaces, tabs, newlines) to a single space
 *  2. Remove whitespace immediately before `. , ! ? ; :`
 *  3. Trim leading/trailing whitespace
 *
 * Empty or all-whitespace input yields "".
 */
export function normalizeTranscript(text: string): string {
  if (!text) {
    return "";
  }

  return text
    .replace(WHITESPACE_RUN, " ")
    .replace(SPACE_BEFORE_PUNCT, "$1")
    .trim();
}
