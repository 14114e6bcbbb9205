/**
 * Torch discovery.
 *
 * Asks a Python interpreter where the `torch` package is installed so the
 * {torch} path templates can be filled in. Torch being absent is normal.
 */
import { spawnSync } from "node:child_process";
import path from "node:path";
import type { Logger } from "../shared/logger.js";
import { redirectStdStreams } from "../logging/writer.js";

export const DEFAULT_PYTHON = "python3";

// find_spec locates the package without importing it.
const PROBE_SCRIPT = [
  "import importlib.util",
  "spec = importlib.util.find_spec('torch')",
  "print(spec.origin if spec is not None and spec.origin else '')",
].join("\n");

export interface CommandResult {
  /** Exit status, or null when the process did not exit normally. */
  status: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process could not be started (e.g. ENOENT). */
  error?: Error;
}

export type CommandRunner = (command: string, args: string[]) => CommandResult;

export function spawnCommand(command: string, args: string[]): CommandResult {
  const result = spawnSync(command, args, {
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "pipe"],
    timeout: 60_000,
  });
  return {
    status: result.status,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    ...(result.error ? { error: result.error } : {}),
  };
}

export interface TorchProbeOptions {
  /** Interpreter to ask. Defaults to python3. */
  python?: string;
  runCommand?: CommandRunner;
  logger?: Logger;
}

/**
 * Locate the installed torch package directory.
 *
 * @returns e.g. "/usr/lib64/python3.12/site-packages/torch", or null when
 *   torch is not installed or the interpreter cannot be run.
 */
export function findTorchDir(options: TorchProbeOptions = {}): string | null {
  const python = options.python ?? DEFAULT_PYTHON;
  const run = options.runCommand ?? spawnCommand;
  const logger = options.logger;

  const result = run(python, ["-c", PROBE_SCRIPT]);

  if (result.error) {
    logger?.debug(`Cannot run ${python}: ${result.error.message}`);
    return null;
  }

  if (logger && result.stderr) {
    const { stderr } = redirectStdStreams(logger.forScope("python"));
    stderr.write(result.stderr);
    stderr.flush();
  }

  if (result.status !== 0) {
    logger?.warn(`${python} exited with status ${String(result.status)} while looking for torch`);
    return null;
  }

  const origin = result.stdout.trim();
  if (!origin) {
    logger?.debug("torch is not installed");
    return null;
  }

  // origin is .../site-packages/torch/__init__.py
  const torchDir = path.dirname(origin);
  logger?.debug(`Found torch at ${torchDir}`);
  return torchDir;
}
