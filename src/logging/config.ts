/**
 * Logging configuration.
 *
 * Builds an explicit LoggingConfig that loggers consult per scope, instead of
 * reconfiguring process-wide logger state.
 */
import { DEFAULT_SCOPE } from "../shared/logger.js";
import type { LevelResolver, LogLevel } from "../shared/types.js";
import { normalizeLogLevel } from "./levels.js";

/** Scope of gfx-prune's own loggers. */
export const APP_SCOPE = DEFAULT_SCOPE;

/** Scopes fed by collaborator processes; quieted outside debug runs. */
export const EXTERNAL_SCOPES = ["python"] as const;

export class LoggingConfig implements LevelResolver {
  readonly rootLevel: LogLevel;
  private readonly overrides: ReadonlyMap<string, LogLevel>;

  constructor(rootLevel: LogLevel, overrides: Record<string, LogLevel> = {}) {
    this.rootLevel = rootLevel;
    this.overrides = new Map(Object.entries(overrides));
  }

  /** Longest dotted-prefix override wins; otherwise the root level. */
  levelFor(scope: string): LogLevel {
    let best: string | null = null;
    for (const key of this.overrides.keys()) {
      const matches = scope === key || scope.startsWith(`${key}.`);
      if (matches && (best === null || key.length > best.length)) {
        best = key;
      }
    }
    return best === null ? this.rootLevel : (this.overrides.get(best) ?? this.rootLevel);
  }

  /** Per-scope overrides, logged by the CLI at debug. */
  moduleLevels(): Record<string, LogLevel> {
    return Object.fromEntries(this.overrides);
  }
}

export interface LoggingOptions {
  /** Level name, e.g. "INFO" or "DEBUG". */
  logLevel: string;
  /** With DEBUG: 1 enables debug for gfx-prune only, 2+ for every scope. */
  debugLevel?: number;
}

export function configureLogging({ logLevel, debugLevel = 0 }: LoggingOptions): LoggingConfig {
  const level = normalizeLogLevel(logLevel);

  if (level === "debug") {
    if (debugLevel < 2) {
      return new LoggingConfig("info", { [APP_SCOPE]: "debug" });
    }
    return new LoggingConfig("debug");
  }

  if (level === "info" || level === "warn") {
    const quiet: Record<string, LogLevel> = {};
    for (const scope of EXTERNAL_SCOPES) {
      quiet[scope] = "error";
    }
    return new LoggingConfig(level, quiet);
  }

  return new LoggingConfig(level);
}
