/**
 * RecordingLogger: captures log calls for test assertions.
 */

import type { Logger, LogLevel } from "./logger.js";

export interface LogRecord {
  readonly level: Exclude<LogLevel, "silent">;
  readonly message: string;
  readonly args: readonly unknown[];
}

/**
 * @example
 * ```ts
 * const logger = new RecordingLogger();
 * const world = new EntityWorld({ resolver, logger });
 * world.setAnimationState(id, "flying_south");
 *
 * expect(logger.messages("warn")).toHaveLength(1);
 * ```
 */
export class RecordingLogger implements Logger {
  readonly records: LogRecord[] = [];

  debug(message: string, ...args: unknown[]): void {
    this.records.push({ level: "debug", message, args });
  }

  info(message: string, ...args: unknown[]): void {
    this.records.push({ level: "info", message, args });
  }

  warn(message: string, ...args: unknown[]): void {
    this.records.push({ level: "warn", message, args });
  }

  error(message: string, ...args: unknown[]): void {
    this.records.push({ level: "error", message, args });
  }

  /** Messages logged at `level`, in order. */
  messages(level: LogRecord["level"]): string[] {
    return this.records.filter((r) => r.level === level).map((r) => r.message);
  }

  clear(): void {
    this.records.length = 0;
  }
}
