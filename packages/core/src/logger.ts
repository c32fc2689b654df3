/**
 * Console logging with a bracketed scope prefix, e.g. `[spritekin:world] ...`.
 *
 * Long-lived objects accept a `Logger` in their options so hosts and tests
 * can swap the sink; the default writes through `console`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Create a logger that prefixes every message with `[scope]` and drops
 * messages below `level`.
 */
export function createConsoleLogger(scope: string, level: LogLevel = "info"): Logger {
  const prefix = `[${scope}]`;
  const enabled = (at: LogLevel): boolean => RANK[at] >= RANK[level];

  return {
    debug(message, ...args) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...args);
    },
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
