// Speech Proficiency Scorer - Configuration
// Reads settings from the environment (populated from .env by dotenv in
// index.ts). Kept free of side effects so it can be tested directly.

import { ConfigError } from "./errors.js";

export const APP_NAME = "Speech Proficiency Scorer";
export const APP_VERSION = "1.0.0";

const DEFAULT_PORT = 3000;
const DEFAULT_TRANSCRIPTION_MODEL = "whisper-1";
const DEFAULT_LANGUAGETOOL_URL = "https://api.languagetool.org/v2";
const DEFAULT_GRAMMAR_LANGUAGE = "en-US";

/** OpenAI's transcription endpoint rejects files above 25 MiB. */
const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024;
const DEFAULT_MAX_REFERENCE_BYTES = 64 * 1024;

export interface AppConfig {
  port: number;
  openaiApiKey: string;
  transcriptionModel: string;
  /** Language hint for transcription; auto-detected when null. */
  transcriptionLanguage: string | null;
  languageToolUrl: string;
  grammarLanguage: string;
  maxUploadBytes: number;
  /** Cap on the reference transcript form field. */
  maxReferenceBytes: number;
}

type Env = Readonly<Record<string, string | undefined>>;

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === null) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const openaiApiKey = readString(env, "OPENAI_API_KEY");
  if (!openaiApiKey) {
    throw new ConfigError("OPENAI_API_KEY is not set. Add it to your .env file.");
  }

  return {
    port: readPositiveInt(env, "PORT", DEFAULT_PORT),
    openaiApiKey,
    transcriptionModel: readString(env, "TRANSCRIPTION_MODEL") ?? DEFAULT_TRANSCRIPTION_MODEL,
    transcriptionLanguage: readString(env, "TRANSCRIPTION_LANGUAGE"),
    languageToolUrl: (readString(env, "LANGUAGETOOL_URL") ?? DEFAULT_LANGUAGETOOL_URL).replace(/\/+$/, ""),
    grammarLanguage: readString(env, "GRAMMAR_LANGUAGE") ?? DEFAULT_GRAMMAR_LANGUAGE,
    maxUploadBytes: readPositiveInt(env, "MAX_UPLOAD_BYTES", DEFAULT_MAX_UPLOAD_BYTES),
    maxReferenceBytes: readPositiveInt(env, "MAX_REFERENCE_BYTES", DEFAULT_MAX_REFERENCE_BYTES),
  };
}
