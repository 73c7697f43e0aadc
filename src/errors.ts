// Speech Proficiency Scorer - Error types
// The scoring core never throws. These cover the boundaries: uploads,
// external engines and configuration. The HTTP layer maps `statusCode`
// straight onto the response.

export class ScoringError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class UnsupportedAudioFormatError extends ScoringError {
  constructor(extension: string, allowed: readonly string[]) {
    super(
      `Unsupported file format "${extension || "(none)"}". Allowed: ${allowed.join(", ")}`,
      400,
    );
  }
}

export class TranscriptionError extends ScoringError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

export class GrammarCheckError extends ScoringError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

/** Raised at start-up; never reaches a client. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
