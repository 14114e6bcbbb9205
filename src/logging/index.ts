/**
 * Logging subsystem for gfx-prune.
 *
 * Level parsing, the per-scope LoggingConfig, and line-buffered writers that
 * route captured stdout/stderr into a Logger.
 */
export { normalizeLogLevel } from "./levels.js";
export type { LogLevel } from "./levels.js";
export { APP_SCOPE, EXTERNAL_SCOPES, LoggingConfig, configureLogging } from "./config.js";
export type { LoggingOptions } from "./config.js";
export { LoggerWriter, redirectStdStreams } from "./writer.js";
export type { StdStreams } from "./writer.js";
