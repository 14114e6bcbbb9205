/**
 * Structured logger for gfx-prune.
 *
 * Writes human-readable output to console and, when a log file is set,
 * JSON log lines appended to that file.
 * Log format: {ts, level, scope, msg}
 * Console format: [scope] message
 */
import fs from "node:fs";
import path from "node:path";
import { LOG_LEVEL_PRIORITY } from "./types.js";
import type { LevelResolver, LogEntry, LogLevel } from "./types.js";
import { errorMessage } from "./guards.js";

export const DEFAULT_SCOPE = "gfx-prune";

/**
 * Redact tokens and passwords that collaborators may print before the
 * line reaches a log file.
 */
export function sanitize(input: string): string {
  let result = input.replace(
    /(api.?key|token|password|secret|credential)[=:]\s*\S+/gi,
    "$1=***REDACTED***",
  );
  result = result.replace(/hf_[A-Za-z0-9]{8,}/g, "***REDACTED***");
  result = result.replace(/ghp_[A-Za-z0-9]+/g, "***REDACTED***");
  result = result.replace(/github_pat_[A-Za-z0-9_]+/g, "***REDACTED***");
  return result;
}

export interface LoggerOptions {
  /** Minimum log level when no resolver is given. Defaults to "info". */
  level?: LogLevel;
  /** Per-scope level resolution; takes precedence over `level`. */
  levels?: LevelResolver;
  /** Append JSON lines to this file. No file output when unset. */
  logFile?: string;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
}

export class Logger {
  readonly scope: string;
  private readonly options: LoggerOptions;
  private fileDisabled = false;

  constructor(scope: string, options: LoggerOptions = {}) {
    this.scope = scope;
    this.options = options;
  }

  fatal(msg: string): void {
    this.log("fatal", msg);
  }

  error(msg: string): void {
    this.log("error", msg);
  }

  warn(msg: string): void {
    this.log("warn", msg);
  }

  info(msg: string): void {
    this.log("info", msg);
  }

  debug(msg: string): void {
    this.log("debug", msg);
  }

  trace(msg: string): void {
    this.log("trace", msg);
  }

  /** Minimum level currently in effect for this logger's scope. */
  level(): LogLevel {
    return this.options.levels?.levelFor(this.scope) ?? this.options.level ?? "info";
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level()];
  }

  /** Create a logger for a sub-scope, e.g. "gfx-prune" -> "gfx-prune.plan". */
  child(name: string): Logger {
    return new Logger(`${this.scope}.${name}`, this.options);
  }

  /** Create a logger for an unrelated scope that shares this logger's sinks. */
  forScope(scope: string): Logger {
    return new Logger(scope, this.options);
  }

  /** Create a copy of this logger that also appends to `logFile`. */
  withFile(logFile: string): Logger {
    return new Logger(this.scope, { ...this.options, logFile });
  }

  private log(level: LogLevel, msg: string): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      scope: this.scope,
      msg,
    };

    if (this.options.consoleOutput ?? true) {
      this.writeConsole(entry);
    }

    if (this.options.logFile && !this.fileDisabled) {
      this.writeFile(this.options.logFile, entry);
    }
  }

  private writeConsole(entry: LogEntry): void {
    const line = `[${entry.scope}] ${entry.msg}`;

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(logFile: string, entry: LogEntry): void {
    try {
      fs.mkdirSync(path.dirname(logFile), { recursive: true });
      const sanitized: LogEntry = { ...entry, msg: sanitize(entry.msg) };
      fs.appendFileSync(logFile, JSON.stringify(sanitized) + "\n", "utf-8");
    } catch (error: unknown) {
      // A broken log file must not abort a prune; report once and keep console output.
      this.fileDisabled = true;
      console.error(`[${this.scope}] Cannot write log file ${logFile}: ${errorMessage(error)}`);
    }
  }
}

/** Create a logger, defaulting to the application scope. */
export function createLogger(scope: string = DEFAULT_SCOPE, options: LoggerOptions = {}): Logger {
  return new Logger(scope, options);
}
