/**
 * Prune planner.
 *
 * Turns resolved targets into a list of paths to remove:
 *   - whole generation trees (DIRTREES) for generations nobody needs
 *   - kernel files in library dirs (BASEDIRS) that only serve unneeded families
 *
 * Planning reads the filesystem but never modifies it. Read failures surface
 * as PlanError.
 */
import fs from "node:fs";
import path from "node:path";
import type { Logger } from "../shared/logger.js";
import { errorMessage } from "../shared/guards.js";
import type { IsaRegistry, ResolvedTargets } from "../isa/registry.js";
import { BASEDIRS, DIRTREES, expandTemplate, validateTemplate, withRoot } from "./templates.js";
import type { PruneAction, PrunePlan } from "./types.js";

const ISA_TOKEN_RE = /gfx\d[\da-f]*/g;

/** A library directory or generation tree could not be inspected. */
export class PlanError extends Error {
  readonly path: string;

  constructor(target: string, cause: unknown) {
    super(`Cannot read ${target}: ${errorMessage(cause)}`, { cause });
    this.name = "PlanError";
    this.path = target;
  }
}

export interface PlanOptions {
  registry: IsaRegistry;
  /** Library directory templates. Defaults to BASEDIRS. */
  basedirs?: readonly string[];
  /** Generation tree templates. Defaults to DIRTREES. */
  dirtrees?: readonly string[];
  /** Sysroot prefixed to every expanded path. */
  root?: string;
  /** Installed torch package directory, or null when absent. */
  torchDir?: string | null;
  logger?: Logger;
}

/** ISA family names mentioned in a file name, e.g. "Kernels.so-000-gfx90a-xnack+.hsaco" -> ["gfx90a"]. */
export function extractIsaTokens(fileName: string): string[] {
  return [...new Set(fileName.match(ISA_TOKEN_RE) ?? [])];
}

/**
 * Decide whether a library file only serves families outside `keep`.
 * Files naming no known family (generic or fallback kernels) are kept.
 */
export function isPrunableFile(
  fileName: string,
  keep: ReadonlySet<string>,
  registry: IsaRegistry,
): boolean {
  const tokens = extractIsaTokens(fileName);
  if (!tokens.some((token) => registry.isKnownShortIsa(token))) {
    return false;
  }
  return !tokens.some((token) => keep.has(token));
}

export function planPrune(targets: ResolvedTargets, options: PlanOptions): PrunePlan {
  const { registry, root, logger } = options;
  const basedirs = options.basedirs ?? BASEDIRS;
  const dirtrees = options.dirtrees ?? DIRTREES;
  const torch = options.torchDir ?? null;

  // Fail on a bad template before touching the filesystem.
  for (const template of [...basedirs, ...dirtrees]) {
    validateTemplate(template);
  }

  const actions = new Map<string, PruneAction>();

  for (const [generation, major] of registry.knownShortGfxs()) {
    if (targets.shortGfxs.has(generation)) continue;

    for (const template of dirtrees) {
      const expanded = expandTemplate(template, { torch, shortversion: String(major) });
      if (expanded === null) continue;
      const tree = withRoot(root, expanded);
      if (!isDirectory(tree)) {
        logger?.debug(`Skipping missing ${tree}`);
        continue;
      }
      actions.set(tree, { kind: "tree", path: tree });
    }
  }

  for (const template of basedirs) {
    const expanded = expandTemplate(template, { torch });
    if (expanded === null) {
      logger?.debug(`Skipping ${template}: torch is not installed`);
      continue;
    }
    const dir = withRoot(root, expanded);
    if (!isDirectory(dir)) {
      logger?.debug(`Skipping missing ${dir}`);
      continue;
    }

    let pruned = 0;
    for (const dirent of readDir(dir)) {
      if (!dirent.isFile()) continue;
      if (!isPrunableFile(dirent.name, targets.shortIsas, registry)) continue;
      const file = path.join(dir, dirent.name);
      actions.set(file, { kind: "file", path: file });
      pruned++;
    }
    logger?.debug(`${dir}: ${pruned} file(s) to remove`);
  }

  return {
    keepIsas: [...targets.shortIsas].sort(),
    keepGfxs: [...targets.shortGfxs].sort(),
    actions: [...actions.values()].sort(byPath),
  };
}

function byPath(a: PruneAction, b: PruneAction): number {
  if (a.path === b.path) return 0;
  return a.path < b.path ? -1 : 1;
}

function isDirectory(target: string): boolean {
  try {
    return fs.existsSync(target) && fs.statSync(target).isDirectory();
  } catch (error: unknown) {
    throw new PlanError(target, error);
  }
}

function readDir(dir: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch (error: unknown) {
    throw new PlanError(dir, error);
  }
}
