/**
 * Line-buffered writers that forward captured output to a Logger.
 */
import { Writable } from "node:stream";
import type { Logger } from "../shared/logger.js";

/**
 * A Writable that buffers text until a newline and hands each completed,
 * trimmed line to `emit`. Blank lines are dropped.
 */
export class LoggerWriter extends Writable {
  readonly isTTY = false;
  private buffer = "";
  private readonly emit: (line: string) => void;

  constructor(emit: (line: string) => void) {
    super({ decodeStrings: false });
    this.emit = emit;
  }

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.buffer += typeof chunk === "string" ? chunk : chunk.toString("utf-8");

    let newline = this.buffer.indexOf("\n");
    while (newline !== -1) {
      this.emitLine(this.buffer.slice(0, newline));
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf("\n");
    }
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.flush();
    callback();
  }

  /** Emit whatever partial line is buffered. */
  flush(): void {
    if (this.buffer) {
      this.emitLine(this.buffer);
      this.buffer = "";
    }
  }

  private emitLine(line: string): void {
    const trimmed = line.trim();
    if (trimmed) {
      this.emit(trimmed);
    }
  }
}

export interface StdStreams {
  /** The logger both writers forward to (file-backed when a log file was given). */
  logger: Logger;
  /** Lines written here are logged at info. */
  stdout: LoggerWriter;
  /** Lines written here are logged at error. */
  stderr: LoggerWriter;
}

/**
 * Build stdout/stderr replacements that route into `logger`.
 *
 * Nothing global is patched: callers pipe a child process or library output
 * into the returned writers.
 */
export function redirectStdStreams(logger: Logger, logFile?: string): StdStreams {
  const target = logFile ? logger.withFile(logFile) : logger;
  return {
    logger: target,
    stdout: new LoggerWriter((line) => target.info(line)),
    stderr: new LoggerWriter((line) => target.error(line)),
  };
}
