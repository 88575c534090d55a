import { redactSensitive } from "./redact.js";

/**
 * Diagnostic sink threaded through every service. Writes to stderr so stdout
 * stays machine-readable JSON.
 */
export interface Logger {
  /** Progress lines, shown with --verbose */
  info(message: string): void;
  /** Low-level detail (payload sizes, raw ids), shown with --verbose */
  debug(message: string): void;
  /** Always shown */
  warn(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Prefix for every line, e.g. the bot name when several bots log at once */
  prefix?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const prefix = options.prefix ? `[${options.prefix}] ` : "";
  const write = (message: string) => console.error(`${prefix}${redactSensitive(message)}`);

  return {
    info: (message) => {
      if (options.verbose) write(message);
    },
    debug: (message) => {
      if (options.verbose) write(message);
    },
    warn: (message) => write(`Warning: ${message}`),
  };
}

/**
 * Derive a logger for one bot, keeping the parent's verbosity.
 */
export function withPrefix(options: LoggerOptions, prefix: string): Logger {
  return createLogger({ ...options, prefix });
}

export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
};
