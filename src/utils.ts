// Shared numeric and text helpers for the Speech Proficiency Scorer.
// Deterministic, dependency-free; used by the scoring modules and the
// transcription adapter so rounding behaves the same everywhere.

// ─── Numbers ────────────────────────────────────────────────────────────────────

const EXACT_TIE = /^50*$/;

/**
 * Round to a fixed number of decimal places. Exact ties go to the even
 * neighbour (6.25 → 6.2, 0.125 → 0.12); anything else rounds on its exact
 * binary value, so 6.35 (stored as 6.3499…) gives 6.3.
 *
 * toFixed alone sends exact ties upward; the tie is read from the exact
 * decimal expansion instead.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }

  const magnitude = Math.abs(value);
  const expansion = magnitude.toFixed(Math.min(100, decimals + 30));
  const point = expansion.indexOf(".");
  const kept = expansion.slice(0, point + 1 + decimals);
  const tail = expansion.slice(point + 1 + decimals);
  const lastKeptDigit = Number(kept.replace(".", "").slice(-1));

  const rounded =
    EXACT_TIE.test(tail) && lastKeptDigit % 2 === 0
      ? Number(kept)
      : Number(magnitude.toFixed(decimals));
  const signed = value < 0 ? -rounded : rounded;
  // Avoid emitting -0 for tiny negative values
  return signed === 0 ? 0 : signed;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Render a number the way the score explanation expects: always at least
 * one fractional digit ("100.0", "82.5", "7.25").
 */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

// ─── Text ───────────────────────────────────────────────────────────────────────

/** Count whitespace-separated tokens. Empty or blank text has zero words. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) return 0;
  return trimmed.split(/\s+/).length;
}
