/**
 * Shared TypeScript types for gfx-prune.
 */

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Lower numbers are more severe. A message is emitted when its priority <= the minimum. */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Dotted logger scope (e.g. "gfx-prune.plan"). */
  scope: string;
  /** Human-readable message. */
  msg: string;
}

/** Resolves the minimum level that applies to a logger scope. */
export interface LevelResolver {
  levelFor(scope: string): LogLevel;
}
