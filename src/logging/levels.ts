/**
 * Log level names as they arrive from flags, env and config files.
 */
import { LOG_LEVELS } from "../shared/types.js";
import type { LogLevel } from "../shared/types.js";

export type { LogLevel };

const ALIASES: Record<string, LogLevel> = {
  warning: "warn",
  critical: "fatal",
};

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Normalize a user-supplied level name ("DEBUG", "Warning", "info") to a LogLevel.
 *
 * @throws Error when the name is not a known level.
 */
export function normalizeLogLevel(name: string): LogLevel {
  const key = name.trim().toLowerCase();
  const level = ALIASES[key] ?? key;
  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level "${name}". Expected one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}
