/**
 * Shared utilities for gfx-prune.
 */
export type { LevelResolver, LogEntry, LogLevel } from "./types.js";
export { LOG_LEVELS, LOG_LEVEL_PRIORITY } from "./types.js";
export { DEFAULT_SCOPE, Logger, createLogger, sanitize } from "./logger.js";
export type { LoggerOptions } from "./logger.js";
export { errorMessage, isNonNegativeInteger, isRecord, isStringArray } from "./guards.js";
