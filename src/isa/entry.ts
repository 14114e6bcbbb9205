/**
 * ISA entries and the names derived from them.
 */
import type { IsaFeature } from "./features.js";

/** One GPU ISA variant known to the ROCm runtime. */
export interface IsaEntry {
  /** Canonical target name, e.g. "gfx906:sramecc+:xnack-". */
  readonly name: string;
  readonly major: number;
  readonly minor: number;
  readonly step: number;
  readonly sramecc: IsaFeature;
  readonly xnack: IsaFeature;
  /** 32 or 64. */
  readonly wavefrontSize: number;
  /** Informational: the reference PyTorch ROCm build ships this variant. */
  readonly supportedByReferenceToolkit: boolean;
}

/** Variant family without feature suffixes: "gfx906:xnack-" -> "gfx906". */
export function shortIsa(entry: IsaEntry): string {
  const colon = entry.name.indexOf(":");
  return colon === -1 ? entry.name : entry.name.slice(0, colon);
}

/** GPU generation, used for whole-tree removal: major 9 -> "gfx9". */
export function shortGfx(entry: IsaEntry): string {
  return `gfx${entry.major}`;
}

/** Value for HSA_OVERRIDE_GFX_VERSION, e.g. "9.0.10". */
export function hsaOverrideVersion(entry: IsaEntry): string {
  return `${entry.major}.${entry.minor}.${entry.step}`;
}

export function formatIsaEntry(entry: IsaEntry): string {
  const torch = entry.supportedByReferenceToolkit ? "yes" : "no";
  return (
    `${entry.name} (${hsaOverrideVersion(entry)}, sramecc=${entry.sramecc}, ` +
    `xnack=${entry.xnack}, wavefront=${entry.wavefrontSize}, torch=${torch})`
  );
}
