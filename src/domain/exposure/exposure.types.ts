/**
 * Value types produced by the exposure pipeline stages.
 * Each stage owns its output; later stages only read.
 */

import type { WindThreshold } from "@/domain/storm/storm.schema";
import type { Region } from "@/domain/airport/airport.schema";

/** One member footprint: wind radius plus positional uncertainty, in km. */
export type ZoneCircle = {
  readonly memberId: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly radiusKm: number;
};

/** Union of member circles for one wind threshold. Empty circles = ring absent. */
export type WindRing = {
  readonly thresholdKt: WindThreshold;
  readonly circles: readonly ZoneCircle[];
};

/** One zone per (stormId, validTime), aggregated across ensemble members. */
export type ImpactZone = {
  readonly stormId: string;
  readonly validTime: string;
  readonly leadTimeHours: number;
  readonly uncertaintyRadiusKm: number;
  readonly memberCount: number;
  readonly rings: Readonly<Record<WindThreshold, WindRing>>;
};

/** Maximal contiguous window an airport sits inside at least the 34 kt ring. */
export type DisruptionInterval = {
  readonly airportCode: string;
  readonly stormId: string;
  readonly startTime: string;
  readonly endTime: string;
  readonly durationHours: number;
  readonly peakWindThresholdKt: WindThreshold;
  readonly closestApproachKm: number;
};

/** Travelers at risk for one (airport, storm, local date). */
export type TravelerDay = {
  readonly airportCode: string;
  readonly stormId: string;
  /** Local civil date at the airport, YYYY-MM-DD. */
  readonly date: string;
  /** Share of the local day covered by disruption, 0..1. */
  readonly overlapFraction: number;
  readonly baselineTravelers: number;
  readonly travelersAtRisk: number;
  /** True when every contributing interval was shorter than the policy trigger. */
  readonly belowTrigger: boolean;
};

/** Terminal output row; one per (airport, storm, date). */
export type ExposureRecord = {
  readonly airportCode: string;
  readonly stormId: string;
  readonly date: string;
  readonly travelersAtRisk: number;
  readonly coverageHolders: number;
  readonly expectedClaims: number;
  readonly expectedPayoutUsd: number;
};

/** Additive totals; combined with a commutative, associative reducer. */
export type ExposureTotals = {
  travelersAtRisk: number;
  coverageHolders: number;
  expectedClaims: number;
  expectedPayoutUsd: number;
};

export type ExposureBreakdownRow = ExposureTotals & { key: string; recordCount: number };

/** HHI on airport payout shares (0–10 000) and top-5 airport share (0–1). */
export type ExposureConcentration = {
  hhi: number;
  top5Share: number;
  maxSingleAirportShare: number;
};

/** Peak wind threshold reached at the airport, as a breakdown key. */
export type PeakWindKey = `${WindThreshold}kt`;

/** Breakdown row by peak wind threshold; airportCount counts distinct airports. */
export type ImpactLevelRow = ExposureBreakdownRow & { key: PeakWindKey; airportCount: number };

/**
 * Per-unit exposure and a 0–100 severity score.
 * Affected airports are those with travelers at risk; per-unit figures divide totalExposureUsd
 * by max(1, count).
 */
export type ExposureRiskMetrics = {
  affectedAirports: number;
  exposurePerTravelerUsd: number;
  exposurePerAirportUsd: number;
  severityScore: number;
};

export type ExposureSummary = {
  totals: ExposureTotals;
  administrativeCostUsd: number;
  totalExposureUsd: number;
  byAirport: ExposureBreakdownRow[];
  byStorm: ExposureBreakdownRow[];
  byDate: ExposureBreakdownRow[];
  byRegion: Array<ExposureBreakdownRow & { key: Region }>;
  /** Empty unless the intervals behind the records are supplied. Highest threshold first. */
  byPeakWindThreshold: ImpactLevelRow[];
  concentration: ExposureConcentration;
  riskMetrics: ExposureRiskMetrics;
};
