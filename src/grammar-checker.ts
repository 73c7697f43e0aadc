// Speech Proficiency Scorer - Grammar Checker
// Boundary adapter around a LanguageTool server (rule-based grammar and
// spelling checker). Loosely-typed JSON matches are mapped here into
// GrammarFinding records; nothing downstream sees the raw response.
//
// Like the transcription engine, the checker owns its client: constructed on
// first use from the injected factory, released by shutdown().

import type { GrammarCheckResult, GrammarFinding } from "./types.js";
import { GrammarCheckError, errorMessage } from "./errors.js";
import { createConsoleLogger, type Logger } from "./logger.js";

/** Suggestions kept per finding. */
export const MAX_SUGGESTIONS = 3;

// ─── LanguageTool client interface (for testability / dependency injection) ──

export interface LanguageToolRequest {
  text: string;
  /** LanguageTool language code, e.g. "en-US". */
  language: string;
}

/**
 * Returns the raw JSON body of a `/v2/check` call. Left as `unknown`: the
 * checker validates the shape itself.
 */
export interface LanguageToolClient {
  check(request: LanguageToolRequest): Promise<unknown>;
}

/**
 * HTTP client for a LanguageTool server, public or self-hosted.
 *
 * @param baseUrl - API root including the version segment, e.g. "https://api.languagetool.org/v2".
 */
export function createHttpLanguageToolClient(baseUrl: string): LanguageToolClient {
  const endpoint = `${baseUrl.replace(/\/+$/, "")}/check`;
  return {
    async check({ text, language }) {
      const res = await fetch(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: new URLSearchParams({ text, language }),
      });
      if (!res.ok) {
        throw new Error(`LanguageTool responded ${res.status} ${res.statusText}`);
      }
      return res.json();
    },
  };
}

// ─── Response mapping ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  return typeof value === "string" ? value : "";
}

function intField(obj: Record<string, unknown>, key: string): number {
  const value = obj[key];
  return typeof value === "number" && Number.isInteger(value) ? value : 0;
}

/**
 * Map one LanguageTool match. `context` is an object upstream
 * (`{ text, offset, length }`); only its text is kept.
 */
function parseMatch(raw: unknown, index: number): GrammarFinding {
  if (!isRecord(raw)) {
    throw new GrammarCheckError(`matches[${index}]: expected an object`);
  }

  const rule = isRecord(raw.rule) ? raw.rule : {};
  const context = isRecord(raw.context) ? stringField(raw.context, "text") : stringField(raw, "context");
  const replacements = Array.isArray(raw.replacements) ? raw.replacements : [];

  const suggestions: string[] = [];
  for (const replacement of replacements) {
    if (suggestions.length >= MAX_SUGGESTIONS) break;
    if (isRecord(replacement) && typeof replacement.value === "string") {
      suggestions.push(replacement.value);
    }
  }

  return {
    message: stringField(raw, "message"),
    ruleId: stringField(rule, "id"),
    context,
    offset: intField(raw, "offset"),
    length: intField(raw, "length"),
    suggestions,
  };
}

export function parseLanguageToolResponse(body: unknown): GrammarCheckResult {
  if (!isRecord(body) || !Array.isArray(body.matches)) {
    throw new GrammarCheckError("LanguageTool response is missing the 'matches' array");
  }

  const findings = body.matches.map((match, index) => parseMatch(match, index));
  return { errorCount: findings.length, findings };
}

// ─── Checker ────────────────────────────────────────────────────────────────────

export interface GrammarCheckerOptions {
  logger?: Logger;
}

export class GrammarChecker {
  private readonly clientFactory: () => LanguageToolClient;
  private client: LanguageToolClient | null = null;
  private readonly logger: Logger;

  constructor(clientFactory: () => LanguageToolClient, options: GrammarCheckerOptions = {}) {
    this.clientFactory = clientFactory;
    this.logger = options.logger ?? createConsoleLogger("GrammarChecker");
  }

  get initialized(): boolean {
    return this.client !== null;
  }

  /**
   * Check normalized transcript text. Blank text never reaches the engine.
   *
   * @throws GrammarCheckError when the engine fails or returns a malformed body.
   */
  async check(text: string, language: string): Promise<GrammarCheckResult> {
    if (!text || text.trim().length === 0) {
      return { errorCount: 0, findings: [] };
    }

    const client = this.getClient();

    let body: unknown;
    try {
      body = await client.check({ text, language });
    } catch (err) {
      throw new GrammarCheckError(`Grammar check failed: ${errorMessage(err)}`, { cause: err });
    }

    return parseLanguageToolResponse(body);
  }

  shutdown(): void {
    if (this.client) {
      this.logger.info("Released LanguageTool client");
    }
    this.client = null;
  }

  private getClient(): LanguageToolClient {
    if (!this.client) {
      this.client = this.clientFactory();
      this.logger.info("Initialized LanguageTool client");
    }
    return this.client;
  }
}
