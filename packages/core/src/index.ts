/**
 * @spritekin/core: entity templates, layered sprite animation and the
 * per-tick systems that drive them.
 *
 * Framework-agnostic: rendering, input and asset decoding belong to the host.
 */

export { EntityError, formatZodIssues } from "./errors.js";
export type { EntityErrorCode } from "./errors.js";

export { createConsoleLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
export { RecordingLogger } from "./recording-logger.js";
export type { LogRecord } from "./recording-logger.js";

export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "./config.js";
export type { EngineConfig, EngineEnv } from "./config.js";

export * from "./components/index.js";
export * from "./templates/index.js";
export * from "./animation/index.js";
export * from "./systems/index.js";
export * from "./world/index.js";
export * from "./simulation/index.js";
