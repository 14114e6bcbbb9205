/**
 * Prune executor: carries out (or, in dry-run mode, only reports) a plan.
 */
import fs from "node:fs";
import type { Logger } from "../shared/logger.js";
import { errorMessage } from "../shared/guards.js";
import type { PrunePlan, PruneSummary } from "./types.js";

export class PruneError extends Error {
  /** Path whose removal failed. */
  readonly path: string;

  constructor(target: string, cause: unknown) {
    super(`Failed to remove ${target}: ${errorMessage(cause)}`, { cause });
    this.name = "PruneError";
    this.path = target;
  }
}

export interface ExecuteOptions {
  /** Log the plan without removing anything. */
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * Remove every path in the plan, in plan order.
 *
 * Paths that vanished since planning are skipped and not counted.
 *
 * @throws PruneError on the first removal that fails; earlier removals stay done.
 */
export function executePlan(plan: PrunePlan, options: ExecuteOptions = {}): PruneSummary {
  const dryRun = options.dryRun ?? false;
  const logger = options.logger;
  const summary: PruneSummary = { dryRun, removedFiles: 0, removedTrees: 0 };

  for (const action of plan.actions) {
    if (dryRun) {
      logger?.info(`Would remove ${action.kind} ${action.path}`);
    } else {
      if (!fs.existsSync(action.path)) {
        logger?.debug(`Already gone: ${action.path}`);
        continue;
      }
      try {
        fs.rmSync(action.path, { recursive: action.kind === "tree", force: true });
      } catch (error: unknown) {
        throw new PruneError(action.path, error);
      }
      logger?.debug(`Removed ${action.kind} ${action.path}`);
    }

    if (action.kind === "tree") {
      summary.removedTrees++;
    } else {
      summary.removedFiles++;
    }
  }

  return summary;
}

export function formatSummary(summary: PruneSummary): string {
  const verb = summary.dryRun ? "Would remove" : "Removed";
  return `${verb} ${summary.removedTrees} director${summary.removedTrees === 1 ? "y" : "ies"} and ${summary.removedFiles} file${summary.removedFiles === 1 ? "" : "s"}`;
}
