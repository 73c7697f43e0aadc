// Speech Proficiency Scorer - Scoring Pipeline
// Pure composition from raw signals to a ScoreResult, plus the mapping of the
// outcome onto the response payload.
//
//   SpeechSignals ─ normalizeTranscript ─┬─ detectFillers ───────┐
//                                        └─ sentenceStats        │
//   (wordCount, durationSec) ─ wordsPerMinute ──────────────────┤
//   GrammarCheckResult ─────────────────────────────────────────┼─ penalties ─ score
//   Maybe<wer> ─────────────────────────────────────────────────┘
//
// Grammar findings and WER are computed by the caller (they need external
// engines); everything here is deterministic.

import type {
  FillerDetection,
  GrammarCheckResult,
  GrammarFinding,
  GrammarFindingPayload,
  Maybe,
  PenaltyBreakdown,
  ScoreResponse,
  ScoreResult,
  SentenceStats,
  SpeechSignals,
} from "./types.js";
import { normalizeTranscript } from "./transcript-normalizer.js";
import { detectFillers } from "./filler-detector.js";
import { sentenceStats, wordsPerMinute } from "./rate-calculator.js";
import {
  fluencyPenalty,
  normalizeFillers,
  normalizeGrammarErrors,
  normalizeWer,
} from "./penalty-normalizer.js";
import { score } from "./composite-scorer.js";
import { mapMaybe, toNullable } from "./utils/maybe.js";
import { roundTo } from "./utils.js";

/** Only this many grammar findings and filler occurrences reach the caller. */
export const MAX_REPORTED_ITEMS = 20;

export interface PipelineInput {
  signals: SpeechSignals;
  grammar: GrammarCheckResult;
  wer: Maybe<number>;
}

export interface PipelineOutcome {
  signals: SpeechSignals;
  normalizedTranscript: string;
  grammar: GrammarCheckResult;
  fillers: FillerDetection;
  wer: Maybe<number>;
  wpm: Maybe<number>;
  sentences: SentenceStats;
  result: ScoreResult;
}

export interface ResponseMeta {
  modelVersion: string;
  generatedAt: Date;
}

export function runScoringPipeline(input: PipelineInput): PipelineOutcome {
  const { signals, grammar, wer } = input;

  const normalizedTranscript = normalizeTranscript(signals.transcript);
  const fillers = detectFillers(normalizedTranscript);
  const wpm = wordsPerMinute(signals.wordCount, signals.durationSec);

  const penalties: PenaltyBreakdown = {
    grammar: normalizeGrammarErrors(grammar.errorCount, signals.wordCount),
    fillers: normalizeFillers(fillers.count, signals.wordCount),
    wer: normalizeWer(wer),
    fluency: fluencyPenalty(wpm),
  };

  return {
    signals,
    normalizedTranscript,
    grammar,
    fillers,
    wer,
    wpm,
    sentences: sentenceStats(normalizedTranscript),
    result: score(penalties),
  };
}

function toFindingPayload(finding: GrammarFinding): GrammarFindingPayload {
  return {
    message: finding.message,
    rule_id: finding.ruleId,
    context: finding.context,
    offset: finding.offset,
    length: finding.length,
    suggestions: [...finding.suggestions],
  };
}

/**
 * Shape a pipeline outcome into the response body. The raw transcript is
 * echoed back; penalties and WER are rounded to 4 decimals.
 */
export function buildScoreResponse(outcome: PipelineOutcome, meta: ResponseMeta): ScoreResponse {
  const { signals, result, sentences } = outcome;

  return {
    asr: {
      transcript: signals.transcript,
      word_count: signals.wordCount,
      duration_sec: signals.durationSec,
      language: signals.language,
    },
    metrics: {
      grammar_errors: outcome.grammar.errorCount,
      fillers: outcome.fillers.count,
      wer: toNullable(mapMaybe(outcome.wer, (w) => roundTo(w, 4))),
      wpm: toNullable(outcome.wpm),
      normalized: {
        grammar: roundTo(result.penalties.grammar, 4),
        fillers: roundTo(result.penalties.fillers, 4),
        wer: roundTo(result.penalties.wer, 4),
        fluency: roundTo(result.penalties.fluency, 4),
      },
      final_score: result.finalScore,
      sentence_stats: {
        sentence_count: sentences.sentenceCount,
        avg_sentence_length: sentences.avgSentenceLength,
        min_sentence_length: sentences.minSentenceLength,
        max_sentence_length: sentences.maxSentenceLength,
      },
    },
    grammar_details: outcome.grammar.findings.slice(0, MAX_REPORTED_ITEMS).map(toFindingPayload),
    filler_words: outcome.fillers.occurrences.slice(0, MAX_REPORTED_ITEMS),
    explanation: result.explanation,
    model_version: meta.modelVersion,
    generated_at: meta.generatedAt.toISOString(),
  };
}
