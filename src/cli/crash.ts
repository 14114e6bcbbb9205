/**
 * Last-resort error reporting for the entry point.
 */
import { APP_SCOPE } from "../logging/config.js";
import { EXIT_FAILURE } from "./program.js";

export function describeCrash(label: string, error: unknown): string {
  const detail = error instanceof Error ? (error.stack ?? error.message) : String(error);
  return `[${APP_SCOPE}] ${label}: ${detail}`;
}

/** Handler that reports `error` under `label` and exits with EXIT_FAILURE. */
export function exitOnCrash(label: string): (error: unknown) => never {
  return (error) => {
    console.error(describeCrash(label, error));
    process.exit(EXIT_FAILURE);
  };
}
