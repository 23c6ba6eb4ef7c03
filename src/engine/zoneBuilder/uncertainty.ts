/**
 * Positional uncertainty growth (pure).
 */

import type { ExposureConfig } from "@/config/exposureDefaults";

export type UncertaintyParams = Pick<
  ExposureConfig,
  "uncertaintyBaseKm" | "uncertaintyGrowthKmPerHour" | "spreadUncertaintyFactor"
>;

/**
 * base + growth × leadHours + spreadFactor × memberSpreadKm.
 * Negative lead times (valid time before init) count as 0.
 */
export function uncertaintyRadiusKm(leadHours: number, memberSpreadKm: number, params: UncertaintyParams): number {
  const lead = Math.max(0, leadHours);
  const spread = Math.max(0, memberSpreadKm);
  return params.uncertaintyBaseKm + params.uncertaintyGrowthKmPerHour * lead + params.spreadUncertaintyFactor * spread;
}
