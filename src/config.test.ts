import { describe, it, expect } from "vitest";
import { APP_NAME, APP_VERSION, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("Project setup", () => {
  it("should export app name", () => {
    expect(APP_NAME).toBe("Speech Proficiency Scorer");
  });

  it("should export app version", () => {
    expect(APP_VERSION).toBe("1.0.0");
  });
});

describe("loadConfig", () => {
  it("applies defaults when only the API key is set", () => {
    expect(loadConfig({ OPENAI_API_KEY: "test-secret" })).toEqual({
      port: 3000,
      openaiApiKey: "test-secret",
      transcriptionModel: "whisper-1",
      transcriptionLanguage: null,
      languageToolUrl: "https://api.languagetool.org/v2",
      grammarLanguage: "en-US",
      maxUploadBytes: 26214400,
      maxReferenceBytes: 65536,
    });
  });

  it("reads every setting from the environment", () => {
    const config = loadConfig({
      OPENAI_API_KEY: "test-secret",
      PORT: "8080",
      TRANSCRIPTION_MODEL: "gpt-4o-transcribe",
      TRANSCRIPTION_LANGUAGE: "de",
      LANGUAGETOOL_URL: "http://localhost:8081/v2//",
      GRAMMAR_LANGUAGE: "de-DE",
      MAX_UPLOAD_BYTES: "1048576",
      MAX_REFERENCE_BYTES: "4096",
    });

    expect(config).toEqual({
      port: 8080,
      openaiApiKey: "test-secret",
      transcriptionModel: "gpt-4o-transcribe",
      transcriptionLanguage: "de",
      languageToolUrl: "http://localhost:8081/v2",
      grammarLanguage: "de-DE",
      maxUploadBytes: 1048576,
      maxReferenceBytes: 4096,
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret", PORT: "  ", TRANSCRIPTION_LANGUAGE: "" });
    expect(config.port).toBe(3000);
    expect(config.transcriptionLanguage).toBeNull();
  });

  it("requires the OpenAI API key", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ OPENAI_API_KEY: " " })).toThrow("OPENAI_API_KEY is not set. Add it to your .env file.");
  });

  it.each(["abc", "0", "-5", "3.5"])("rejects PORT=%s", (port) => {
    expect(() => loadConfig({ OPENAI_API_KEY: "test-secret", PORT: port })).toThrow(
      `PORT must be a positive integer, got "${port}"`,
    );
  });
});
