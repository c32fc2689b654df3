/**
 * Engine-wide settings.
 *
 * Precedence, lowest first: built-in defaults, `SPRITEKIN_*` environment
 * variables, explicit overrides.
 */

import { z } from "zod";
import { EntityError, formatZodIssues } from "./errors.js";
import type { LogLevel } from "./logger.js";

export interface EngineConfig {
  /** Frame duration in ms for animation blocks that declare no `frame_interval`. */
  readonly defaultFrameInterval: number;
  /** Milliseconds between steps of the `IntervalTicker`. */
  readonly tickInterval: number;
  /** Animation state a freshly spawned entity starts in. */
  readonly initialAnimationState: string;
  /** Minimum level for the default console loggers. */
  readonly logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  defaultFrameInterval: 100,
  tickInterval: 16,
  initialAnimationState: "stationary_south",
  logLevel: "info",
};

const engineConfigSchema = z.object({
  defaultFrameInterval: z.number().positive(),
  tickInterval: z.number().positive(),
  initialAnimationState: z.string().min(1),
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
});

/** Environment variables read by `resolveEngineConfig`. */
export type EngineEnv = Readonly<Record<string, string | undefined>>;

function fromEnv(env: EngineEnv): Partial<EngineConfig> {
  const raw: Record<string, unknown> = {};
  const frameInterval = env["SPRITEKIN_FRAME_INTERVAL"];
  const tickInterval = env["SPRITEKIN_TICK_INTERVAL"];
  const logLevel = env["SPRITEKIN_LOG_LEVEL"];

  if (frameInterval !== undefined) raw["defaultFrameInterval"] = Number(frameInterval);
  if (tickInterval !== undefined) raw["tickInterval"] = Number(tickInterval);
  if (logLevel !== undefined) raw["logLevel"] = logLevel;

  const parsed = engineConfigSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw new EntityError("INVALID_CONFIG", "Invalid SPRITEKIN_* environment settings", {
      issues: formatZodIssues(parsed.error),
    });
  }
  return parsed.data;
}

/**
 * Build the effective engine config.
 *
 * @param overrides - Values that win over everything else.
 * @param env - Defaults to `process.env`.
 */
export function resolveEngineConfig(
  overrides: Partial<EngineConfig> = {},
  env: EngineEnv = process.env,
): EngineConfig {
  const merged = { ...DEFAULT_ENGINE_CONFIG, ...fromEnv(env), ...overrides };
  const parsed = engineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new EntityError("INVALID_CONFIG", "Invalid engine configuration", {
      issues: formatZodIssues(parsed.error),
    });
  }
  return parsed.data;
}
