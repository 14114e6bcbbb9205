/**
 * Types for prune planning and execution.
 */

export type PruneActionKind = "tree" | "file";

export interface PruneAction {
  /** "tree" removes a directory recursively, "file" a single file. */
  kind: PruneActionKind;
  /** Absolute path, already prefixed with the sysroot. */
  path: string;
}

export interface PrunePlan {
  /** Families whose kernel files are kept, e.g. "gfx906". */
  keepIsas: string[];
  /** Generations whose trees are kept, e.g. "gfx9". */
  keepGfxs: string[];
  /** Removals sorted by path. */
  actions: PruneAction[];
}

export interface PruneSummary {
  dryRun: boolean;
  removedFiles: number;
  removedTrees: number;
}
