/**
 * Disk-space reclamation for ROCm installs: plan and remove kernel files and
 * generation trees for GPUs that are not targeted.
 */
export type { PruneAction, PruneActionKind, PrunePlan, PruneSummary } from "./types.js";
export {
  BASEDIRS,
  DIRTREES,
  TEMPLATE_VARIABLES,
  TemplateError,
  expandTemplate,
  validateTemplate,
  withRoot,
} from "./templates.js";
export type { TemplateVariable, TemplateVars } from "./templates.js";
export { DEFAULT_PYTHON, findTorchDir, spawnCommand } from "./torch.js";
export type { CommandResult, CommandRunner, TorchProbeOptions } from "./torch.js";
export { PlanError, extractIsaTokens, isPrunableFile, planPrune } from "./planner.js";
export type { PlanOptions } from "./planner.js";
export { PruneError, executePlan, formatSummary } from "./executor.js";
export type { ExecuteOptions } from "./executor.js";
