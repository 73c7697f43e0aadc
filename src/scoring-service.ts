// Speech Proficiency Scorer - Scoring Service
// Orchestrates one scoring request: transcription → normalization → grammar
// check → optional WER → pure scoring pipeline → response payload.
//
// Stateless per request. The only long-lived state is the engines' clients,
// which the service owns through its dependencies and releases on shutdown().

import { extname } from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { Maybe, ScoreResponse } from "./types.js";
import type { TranscriptionEngine, TranscriptionModelInfo } from "./transcription-engine.js";
import type { GrammarChecker } from "./grammar-checker.js";
import { normalizeTranscript } from "./transcript-normalizer.js";
import { wordErrorRate } from "./word-error-rate.js";
import { buildScoreResponse, runScoringPipeline } from "./scoring-pipeline.js";
import { UnsupportedAudioFormatError } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { ABSENT, fromNullable, isPresent, toNullable } from "./utils/maybe.js";

export const ALLOWED_AUDIO_EXTENSIONS: readonly string[] = [
  ".wav",
  ".mp3",
  ".m4a",
  ".flac",
  ".ogg",
  ".webm",
];

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface ScoringServiceDeps {
  transcriptionEngine: TranscriptionEngine;
  grammarChecker: GrammarChecker;
  /** LanguageTool language code for grammar checking. Default "en-US". */
  grammarLanguage?: string;
  /** Injectable clock for `generated_at`. */
  now?: () => Date;
  logger?: Logger;
}

export interface ScoreAudioRequest {
  audio: Buffer;
  filename: string;
  /** Ground-truth text; enables WER when non-blank. */
  referenceTranscript?: string | null;
}

export interface EngineStatus {
  transcription: TranscriptionModelInfo;
  grammar: {
    status: "loaded" | "not_loaded";
    language: string;
  };
}

export class ScoringService {
  private readonly transcriptionEngine: TranscriptionEngine;
  private readonly grammarChecker: GrammarChecker;
  private readonly grammarLanguage: string;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: ScoringServiceDeps) {
    this.transcriptionEngine = deps.transcriptionEngine;
    this.grammarChecker = deps.grammarChecker;
    this.grammarLanguage = deps.grammarLanguage ?? "en-US";
    this.now = deps.now ?? (() => new Date());
    this.logger = deps.logger ?? createConsoleLogger("ScoringService");
  }

  /**
   * Reject anything that isn't a known audio container before spending an
   * API call on it.
   */
  validateFilename(filename: string): void {
    const extension = extname(filename).toLowerCase();
    if (!ALLOWED_AUDIO_EXTENSIONS.includes(extension)) {
      throw new UnsupportedAudioFormatError(extension, ALLOWED_AUDIO_EXTENSIONS);
    }
  }

  /**
   * Score one audio sample end to end. Engine failures propagate as
   * TranscriptionError / GrammarCheckError.
   */
  async scoreAudio(request: ScoreAudioRequest): Promise<ScoreResponse> {
    const requestId = uuidv4();
    this.validateFilename(request.filename);

    this.logger.info(`[${requestId}] Scoring ${request.filename} (${request.audio.length} bytes)`);

    const signals = await this.transcriptionEngine.transcribe(request.audio, request.filename);
    const normalized = normalizeTranscript(signals.transcript);
    this.logger.info(
      `[${requestId}] Transcribed ${signals.wordCount} words over ${signals.durationSec}s (${signals.language})`,
    );

    const grammar = await this.grammarChecker.check(normalized, this.grammarLanguage);
    const wer = this.computeWer(fromNullable(request.referenceTranscript), normalized);

    const outcome = runScoringPipeline({ signals, grammar, wer });
    this.logger.info(
      `[${requestId}] Score ${outcome.result.finalScore} ` +
        `(grammar errors: ${grammar.errorCount}, fillers: ${outcome.fillers.count}, ` +
        `wpm: ${toNullable(outcome.wpm) ?? "n/a"}, wer: ${toNullable(wer) ?? "n/a"})`,
    );

    return buildScoreResponse(outcome, {
      modelVersion: this.transcriptionEngine.modelVersion,
      generatedAt: this.now(),
    });
  }

  /** Which engine clients are currently built; reported by GET /health. */
  engineStatus(): EngineStatus {
    return {
      transcription: this.transcriptionEngine.modelInfo(),
      grammar: {
        status: this.grammarChecker.initialized ? "loaded" : "not_loaded",
        language: this.grammarLanguage,
      },
    };
  }

  shutdown(): void {
    this.transcriptionEngine.shutdown();
    this.grammarChecker.shutdown();
  }

  private computeWer(reference: Maybe<string>, hypothesis: string): Maybe<number> {
    if (!isPresent(reference) || reference.value.trim().length === 0) {
      return ABSENT;
    }
    return wordErrorRate(reference.value, hypothesis);
  }
}
