/* eslint-disable no-console */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit `[DEBUG]` lines (default: false) */
  verbose?: boolean;
}

/**
 * Logger writing prefixed lines to stderr, so stdout stays free for document output.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    debug: (message) => {
      if (verbose) console.error(`[DEBUG] ${message}`);
    },
    info: (message) => console.error(`[INFO] ${message}`),
    warn: (message) => console.error(`[WARN] ${message}`),
    error: (message) => console.error(`[ERROR] ${message}`),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
