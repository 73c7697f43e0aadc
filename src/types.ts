// Speech Proficiency Scorer - Shared TypeScript interfaces and types
// Everything here is a value type: built once per request, never mutated.

// ─── Optional measurements ──────────────────────────────────────────────────────

export interface Present<T> {
  readonly kind: "present";
  readonly value: T;
}

export interface Absent {
  readonly kind: "absent";
}

/**
 * A measurement that may not be computable for a request (WER without a
 * reference transcript, WPM without a duration). Runtime helpers live in
 * utils/maybe.ts.
 */
export type Maybe<T> = Present<T> | Absent;

// ─── Transcription boundary ─────────────────────────────────────────────────────

export interface SpeechSignals {
  /** Raw transcript as returned by the transcription engine. */
  readonly transcript: string;
  readonly wordCount: number;
  readonly durationSec: number;
  /** Language tag reported (or requested) by the engine, e.g. "en". */
  readonly language: string;
}

// ─── Grammar boundary ───────────────────────────────────────────────────────────

export interface GrammarFinding {
  readonly message: string;
  readonly ruleId: string;
  readonly context: string;
  readonly offset: number;
  readonly length: number;
  /** At most three suggested replacements, best first. */
  readonly suggestions: readonly string[];
}

export interface GrammarCheckResult {
  readonly errorCount: number;
  readonly findings: readonly GrammarFinding[];
}

// ─── Text features ──────────────────────────────────────────────────────────────

export interface FillerDetection {
  readonly count: number;
  /** Matched literals, in filler pattern order (not text order). */
  readonly occurrences: readonly string[];
}

export interface SentenceStats {
  readonly sentenceCount: number;
  readonly avgSentenceLength: number;
  readonly minSentenceLength: number;
  readonly maxSentenceLength: number;
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export type PenaltyComponent = "grammar" | "fillers" | "wer" | "fluency";

/** Normalized penalties, each in [0, 1] where 0 means no deduction. */
export type PenaltyBreakdown = Readonly<Record<PenaltyComponent, number>>;

export interface ScoreResult {
  readonly finalScore: number;
  readonly penalties: PenaltyBreakdown;
  readonly explanation: string;
}

// ─── Wire format (POST /score response body) ────────────────────────────────────

export interface AsrPayload {
  transcript: string;
  word_count: number;
  duration_sec: number;
  language: string;
}

export interface SentenceStatsPayload {
  sentence_count: number;
  avg_sentence_length: number;
  min_sentence_length: number;
  max_sentence_length: number;
}

export interface MetricsPayload {
  grammar_errors: number;
  fillers: number;
  wer: number | null;
  wpm: number | null;
  normalized: Record<PenaltyComponent, number>;
  final_score: number;
  sentence_stats: SentenceStatsPayload;
}

export interface GrammarFindingPayload {
  message: string;
  rule_id: string;
  context: string;
  offset: number;
  length: number;
  suggestions: string[];
}

export interface ScoreResponse {
  asr: AsrPayload;
  metrics: MetricsPayload;
  grammar_details: GrammarFindingPayload[];
  filler_words: string[];
  explanation: string;
  model_version: string;
  generated_at: string;
}
