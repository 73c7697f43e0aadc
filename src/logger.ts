// Speech Proficiency Scorer - Logging
// Console-backed logger with bracketed level prefixes. Components take a
// Logger through their options so tests can pass a silent one.

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * `[INFO] [Component] message`. The component tag is omitted when not given.
 */
export function createConsoleLogger(component?: string): Logger {
  const tag = component ? ` [${component}]` : "";
  return {
    info: (msg, ...args) => console.log(`[INFO]${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN]${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR]${tag} ${msg}`, ...args),
  };
}
