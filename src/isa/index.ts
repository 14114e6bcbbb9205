/**
 * GPU ISA table and target resolution.
 */
export { ISA_FEATURES, isIsaFeature, isaFeatureFromOrdinal, isaFeatureOrdinal } from "./features.js";
export type { IsaFeature } from "./features.js";
export { formatIsaEntry, hsaOverrideVersion, shortGfx, shortIsa } from "./entry.js";
export type { IsaEntry } from "./entry.js";
export { IsaTableError, loadIsaTable, parseIsaTable, resolveTablePath } from "./table.js";
export {
  IsaRegistry,
  TARGET_SEPARATOR,
  UnknownIsaError,
  defaultRegistry,
  lookup,
  resolveTargets,
} from "./registry.js";
export type { ResolveOptions, ResolvedTargets } from "./registry.js";
