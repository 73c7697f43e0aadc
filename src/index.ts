// Speech Proficiency Scorer - Entry point
// Loads configuration, wires the engines into the scoring service and starts
// the HTTP server.

import "dotenv/config";
import { APP_NAME, APP_VERSION, loadConfig, type AppConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { createAppServer } from "./server.js";
import { ScoringService } from "./scoring-service.js";
import { TranscriptionEngine, createOpenAITranscriptionClient } from "./transcription-engine.js";
import { GrammarChecker, createHttpLanguageToolClient } from "./grammar-checker.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(errorMessage(err));
  process.exit(1);
}

logInit("Configuration loaded");

// ─── Initialize engines (clients are built lazily on first request) ─────────────

logInit(`Registering TranscriptionEngine (OpenAI ${config.transcriptionModel})...`);
const transcriptionEngine = new TranscriptionEngine(
  () => createOpenAITranscriptionClient(config.openaiApiKey),
  { model: config.transcriptionModel, language: config.transcriptionLanguage },
);

logInit(`Registering GrammarChecker (LanguageTool at ${config.languageToolUrl})...`);
const grammarChecker = new GrammarChecker(() => createHttpLanguageToolClient(config.languageToolUrl));

const scoringService = new ScoringService({
  transcriptionEngine,
  grammarChecker,
  grammarLanguage: config.grammarLanguage,
});

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  scoringService,
  maxUploadBytes: config.maxUploadBytes,
  maxReferenceBytes: config.maxReferenceBytes,
});

function shutdown(signal: string): void {
  logInit(`${signal} received, shutting down`);
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

server.listen(config.port).then(
  () => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit("Pipeline: OpenAI Transcribe → Normalizer → LanguageTool + Fillers + WPM → Penalties → Score");
  },
  (err: unknown) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  },
);
