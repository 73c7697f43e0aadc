// Speech Proficiency Scorer - Server Tests
// Drives the Express app over real HTTP on an OS-assigned port, with the
// engines' external clients replaced by in-process fakes.

import { describe, it, expect, afterEach, vi } from "vitest";
import { createAppServer, type AppServer } from "./server.js";
import { ScoringService } from "./scoring-service.js";
import { TranscriptionEngine, type OpenAITranscriptionResponse } from "./transcription-engine.js";
import { GrammarChecker } from "./grammar-checker.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

interface ServerOptions {
  transcription?: OpenAITranscriptionResponse | Error;
  now?: () => Date;
  maxUploadBytes?: number;
  maxReferenceBytes?: number;
}

function buildServer(options: ServerOptions = {}): AppServer {
  const transcription = options.transcription ?? {
    text: "So we basically shipped it.",
    duration: 2.5,
    language: "en",
  };

  const transcriptionEngine = new TranscriptionEngine(
    () => ({
      audio: {
        transcriptions: {
          create: async (): Promise<OpenAITranscriptionResponse> => {
            if (transcription instanceof Error) throw transcription;
            return transcription;
          },
        },
      },
    }),
    { logger: createSilentLogger() },
  );
  const grammarChecker = new GrammarChecker(() => ({ check: async () => ({ matches: [] }) }), {
    logger: createSilentLogger(),
  });

  const scoringService = new ScoringService({
    transcriptionEngine,
    grammarChecker,
    now: options.now ?? (() => new Date("2025-03-04T05:06:07.000Z")),
    logger: createSilentLogger(),
  });

  return createAppServer({
    scoringService,
    maxUploadBytes: options.maxUploadBytes,
    maxReferenceBytes: options.maxReferenceBytes,
    logger: createSilentLogger(),
  });
}

async function startServer(options?: ServerOptions): Promise<{ server: AppServer; baseUrl: string }> {
  const server = buildServer(options);
  await server.listen(TEST_PORT);
  const address = server.httpServer.address();
  if (address === null || typeof address === "string") {
    throw new Error("server is not bound to a TCP port");
  }
  const { port } = address;
  return { server, baseUrl: `http://127.0.0.1:${port}` };
}

function audioForm(filename: string, bytes = 64, reference?: string): FormData {
  const form = new FormData();
  if (reference !== undefined) {
    form.append("reference_transcript", reference);
  }
  form.append("audio", new Blob([new Uint8Array(bytes)]), filename);
  return form;
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("Speech Proficiency Scorer server", () => {
  let running: AppServer | null = null;

  afterEach(async () => {
    if (running) {
      await running.close();
      running = null;
    }
  });

  async function start(options?: ServerOptions): Promise<string> {
    const { server, baseUrl } = await startServer(options);
    running = server;
    return baseUrl;
  }

  describe("GET /health", () => {
    it("reports status and version", async () => {
      const baseUrl = await start();
      const res = await fetch(`${baseUrl}/health`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.status).toBe("ok");
      expect(body.version).toBe("1.0.0");
      expect(typeof body.timestamp).toBe("string");
      expect(body.engines).toEqual({
        transcription: { status: "not_loaded", model: "whisper-1" },
        grammar: { status: "not_loaded", language: "en-US" },
      });
    });
  });

  describe("GET /", () => {
    it("describes the API", async () => {
      const baseUrl = await start();
      const body = await (await fetch(`${baseUrl}/`)).json();

      expect(body).toEqual({
        message: "Speech Proficiency Scorer API",
        version: "1.0.0",
        endpoints: { health: "/health", score: "/score (POST)" },
      });
    });
  });

  describe("POST /score", () => {
    it("returns the score response for a valid upload", async () => {
      const baseUrl = await start();
      const res = await fetch(`${baseUrl}/score`, { method: "POST", body: audioForm("pitch.wav") });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.asr).toEqual({
        transcript: "So we basically shipped it.",
        word_count: 5,
        duration_sec: 2.5,
        language: "en",
      });
      expect(body.metrics.wpm).toBe(120);
      expect(body.metrics.fillers).toBe(2);
      expect(body.filler_words).toEqual(["basically", "so"]);
      expect(body.metrics.wer).toBeNull();
      expect(body.model_version).toBe("whisper-1");
      expect(body.generated_at).toBe("2025-03-04T05:06:07.000Z");
    });

    it("uses the reference_transcript field for WER", async () => {
      const baseUrl = await start();
      const res = await fetch(`${baseUrl}/score`, {
        method: "POST",
        body: audioForm("pitch.mp3", 64, "So we basically shipped it."),
      });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.metrics.wer).toBe(0);
    });

    it("responds 400 when no file is attached", async () => {
      const baseUrl = await start();
      const form = new FormData();
      form.append("reference_transcript", "hello");

      const res = await fetch(`${baseUrl}/score`, { method: "POST", body: form });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'No audio file uploaded. Send it as multipart field "audio".',
      });
    });

    it("responds 400 for an unsupported extension", async () => {
      const baseUrl = await start();
      const res = await fetch(`${baseUrl}/score`, { method: "POST", body: audioForm("notes.txt") });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Unsupported file format ".txt". Allowed: .wav, .mp3, .m4a, .flac, .ogg, .webm',
      });
    });

    it("responds 400 when the upload exceeds the size limit", async () => {
      const baseUrl = await start({ maxUploadBytes: 16 });
      const res = await fetch(`${baseUrl}/score`, { method: "POST", body: audioForm("big.wav", 32) });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "File too large" });
    });

    it("responds 400 when the reference transcript exceeds its size limit", async () => {
      const baseUrl = await start({ maxReferenceBytes: 32 });
      const res = await fetch(`${baseUrl}/score`, {
        method: "POST",
        body: audioForm("pitch.wav", 64, "word ".repeat(20)),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Field value too long" });
    });

    it("responds 502 when transcription fails", async () => {
      const baseUrl = await start({ transcription: new Error("upstream unavailable") });
      const res = await fetch(`${baseUrl}/score`, { method: "POST", body: audioForm("pitch.wav") });

      expect(res.status).toBe(502);
      expect(await res.json()).toEqual({ error: "Transcription failed for pitch.wav: upstream unavailable" });
    });

    it("responds 500 for unexpected failures", async () => {
      const baseUrl = await start({
        now: () => {
          throw new Error("clock unavailable");
        },
      });
      const res = await fetch(`${baseUrl}/score`, { method: "POST", body: audioForm("pitch.wav") });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: "Error processing audio file: clock unavailable" });
    });
  });

  describe("close", () => {
    it("resolves when the server was never started", async () => {
      const server = buildServer();
      await expect(server.close()).resolves.toBeUndefined();
    });
  });
});
