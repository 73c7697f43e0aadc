// Speech Proficiency Scorer - Transcription Engine
// Boundary adapter around OpenAI's audio transcription API. Produces the
// SpeechSignals the scoring core consumes; the core never sees the SDK.
//
// The SDK client is owned by the engine: built on first use from the injected
// factory, reused across requests, released by shutdown().
// Audio is sent to OpenAI in-memory only, never written to disk.

import OpenAI from "openai";
import type { SpeechSignals } from "./types.js";
import { TranscriptionError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { countWords, roundTo } from "./utils.js";

// ─── OpenAI transcription client interface (for testability / dependency injection) ──

/**
 * Minimal interface for the OpenAI audio transcriptions API surface we use.
 * Tests inject a fake; production code wraps the SDK with
 * createOpenAITranscriptionClient().
 */
export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: {
        file: File;
        model: string;
        response_format: "json" | "verbose_json";
        language?: string;
      }): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/**
 * `duration` and `language` only come back with `verbose_json`
 * (whisper-1). gpt-4o-transcribe models return text only.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
}

/**
 * Wraps the real SDK in the narrow client interface. The verbose response's
 * duration is coerced with Number(): some SDK releases type it as a string.
 */
export function createOpenAITranscriptionClient(apiKey: string): OpenAITranscriptionClient {
  const openai = new OpenAI({ apiKey });
  return {
    audio: {
      transcriptions: {
        async create(params) {
          const language = params.language ? { language: params.language } : {};
          if (params.response_format === "verbose_json") {
            const res = await openai.audio.transcriptions.create({
              file: params.file,
              model: params.model,
              response_format: "verbose_json",
              ...language,
            });
            return { text: res.text, duration: Number(res.duration), language: res.language };
          }
          const res = await openai.audio.transcriptions.create({
            file: params.file,
            model: params.model,
            response_format: "json",
            ...language,
          });
          return { text: res.text };
        },
      },
    },
  };
}

// ─── Engine ─────────────────────────────────────────────────────────────────────

export interface TranscriptionEngineOptions {
  /** OpenAI model id. Defaults to "whisper-1". */
  model?: string;
  /** ISO-639-1 language hint; null lets the model detect it. */
  language?: string | null;
  logger?: Logger;
}

export interface TranscriptionModelInfo {
  status: "loaded" | "not_loaded";
  model: string;
}

const FALLBACK_LANGUAGE = "en";

export class TranscriptionEngine {
  private readonly clientFactory: () => OpenAITranscriptionClient;
  private client: OpenAITranscriptionClient | null = null;
  private readonly model: string;
  private readonly language: string | null;
  private readonly logger: Logger;

  constructor(clientFactory: () => OpenAITranscriptionClient, options: TranscriptionEngineOptions = {}) {
    this.clientFactory = clientFactory;
    this.model = options.model ?? "whisper-1";
    this.language = options.language ?? null;
    this.logger = options.logger ?? createConsoleLogger("TranscriptionEngine");
  }

  /** Reported to callers as `model_version`. */
  get modelVersion(): string {
    return this.model;
  }

  modelInfo(): TranscriptionModelInfo {
    return {
      status: this.client ? "loaded" : "not_loaded",
      model: this.model,
    };
  }

  /**
   * Transcribe one audio sample.
   *
   * @param audio - Raw file bytes as uploaded (wav, mp3, m4a, flac, ogg, webm).
   * @param filename - Original filename; OpenAI infers the container from its extension.
   * @throws TranscriptionError for empty audio or any API failure.
   */
  async transcribe(audio: Buffer, filename: string): Promise<SpeechSignals> {
    if (audio.length === 0) {
      throw new TranscriptionError(`Audio file is empty: ${filename}`);
    }

    const client = this.getClient();
    const file = new File([new Uint8Array(audio)], filename);
    const useVerboseJson = this.model === "whisper-1";

    let response: OpenAITranscriptionResponse;
    try {
      response = await client.audio.transcriptions.create({
        file,
        model: this.model,
        response_format: useVerboseJson ? "verbose_json" : "json",
        ...(this.language ? { language: this.language } : {}),
      });
    } catch (err) {
      throw new TranscriptionError(`Transcription failed for ${filename}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    return this.toSpeechSignals(response);
  }

  /** Drops the SDK client; the next transcribe() builds a fresh one. */
  shutdown(): void {
    if (this.client) {
      this.logger.info(`Released ${this.model} client`);
    }
    this.client = null;
  }

  private getClient(): OpenAITranscriptionClient {
    if (!this.client) {
      this.client = this.clientFactory();
      this.logger.info(`Initialized ${this.model} client`);
    }
    return this.client;
  }

  private toSpeechSignals(response: OpenAITranscriptionResponse): SpeechSignals {
    const transcript = response.text.trim();
    const rawDuration = response.duration ?? 0;
    const durationSec = Number.isFinite(rawDuration) && rawDuration > 0 ? roundTo(rawDuration, 2) : 0;
    const language = response.language || this.language || FALLBACK_LANGUAGE;

    return {
      transcript,
      wordCount: countWords(transcript),
      durationSec,
      language,
    };
  }
}
