// Speech Proficiency Scorer - HTTP Server
// Express app exposing the scoring pipeline over multipart upload.
//
// Privacy: uploads are held in memory (multer memory storage) for the
// duration of the request only. No temp files, no database.

import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import multer from "multer";
import { createServer, type Server as HttpServer } from "node:http";
import type { ScoringService } from "./scoring-service.js";
import { APP_NAME, APP_VERSION } from "./config.js";
import { ScoringError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Multipart field carrying the audio file. */
export const AUDIO_FIELD = "audio";

/** Optional multipart text field with the ground-truth transcript. */
export const REFERENCE_FIELD = "reference_transcript";

const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024;
const DEFAULT_MAX_REFERENCE_BYTES = 64 * 1024;

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  scoringService: ScoringService;
  /** Upload size limit in bytes. Defaults to 25 MiB. */
  maxUploadBytes?: number;
  /**
   * Size limit for the reference transcript field, in bytes. WER alignment
   * is quadratic in word counts. Defaults to 64 KiB.
   */
  maxReferenceBytes?: number;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Stop accepting connections and release the scoring engines. */
  close(): Promise<void>;
}

/**
 * Creates the Express app and HTTP server.
 * Does NOT start listening — call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    scoringService,
    maxUploadBytes = DEFAULT_MAX_UPLOAD_BYTES,
    maxReferenceBytes = DEFAULT_MAX_REFERENCE_BYTES,
    logger = createConsoleLogger("Server"),
  } = options;

  const app = express();
  const httpServer = createServer(app);

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, fieldSize: maxReferenceBytes, files: 1 },
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
      engines: scoringService.engineStatus(),
    });
  });

  app.get("/", (_req, res) => {
    res.json({
      message: `${APP_NAME} API`,
      version: APP_VERSION,
      endpoints: {
        health: "/health",
        score: "/score (POST)",
      },
    });
  });

  app.post("/score", upload.single(AUDIO_FIELD), (req, res, next) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: `No audio file uploaded. Send it as multipart field "${AUDIO_FIELD}".` });
      return;
    }

    scoringService
      .scoreAudio({
        audio: file.buffer,
        filename: file.originalname,
        referenceTranscript: readReferenceTranscript(req),
      })
      .then((body) => {
        res.json(body);
      }, next);
  });

  app.use(createErrorHandler(logger));

  return {
    app,
    httpServer,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        scoringService.shutdown();
        if (!httpServer.listening) {
          resolve();
          return;
        }
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function readReferenceTranscript(req: Request): string | null {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || !(REFERENCE_FIELD in body)) {
    return null;
  }
  const value = body[REFERENCE_FIELD];
  return typeof value === "string" ? value : null;
}

/**
 * Maps failures onto JSON error bodies:
 *  - multer limits (file too large, unexpected field) → 400
 *  - ScoringError → its own statusCode (400 bad format, 502 engine failure)
 *  - anything else → 500
 */
function createErrorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof multer.MulterError) {
      logger.warn(`Rejected upload on ${req.path}: ${err.message}`);
      res.status(400).json({ error: err.message });
      return;
    }

    if (err instanceof ScoringError) {
      if (err.statusCode >= 500) {
        logger.error(`${err.name} on ${req.path}: ${err.message}`);
      } else {
        logger.warn(`${err.name} on ${req.path}: ${err.message}`);
      }
      res.status(err.statusCode).json({ error: err.message });
      return;
    }

    logger.error(`Unhandled error on ${req.path}: ${errorMessage(err)}`);
    res.status(500).json({ error: `Error processing audio file: ${errorMessage(err)}` });
  };
}
