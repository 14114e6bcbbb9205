/**
 * Hardware feature gates of an ISA variant (SRAMECC, XNACK).
 *
 * Ordinals follow the ROCm runtime: unsupported=0, any=1, disabled=2, enabled=3.
 */

export const ISA_FEATURES = ["unsupported", "any", "disabled", "enabled"] as const;

export type IsaFeature = (typeof ISA_FEATURES)[number];

export function isIsaFeature(value: unknown): value is IsaFeature {
  return typeof value === "string" && (ISA_FEATURES as readonly string[]).includes(value);
}

export function isaFeatureOrdinal(feature: IsaFeature): number {
  return ISA_FEATURES.indexOf(feature);
}

export function isaFeatureFromOrdinal(ordinal: number): IsaFeature {
  const feature = ISA_FEATURES[ordinal];
  if (feature === undefined) {
    throw new RangeError(`Invalid ISA feature ordinal ${ordinal}`);
  }
  return feature;
}
