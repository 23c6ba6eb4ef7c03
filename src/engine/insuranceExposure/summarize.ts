/**
 * Explainable breakdown of exposure records: totals, per-dimension rows and concentration.
 */

import type { Airport, Region } from "@/domain/airport/airport.schema";
import { airportRegion } from "@/domain/airport/airport.schema";
import type { WindThreshold } from "@/domain/storm/storm.schema";
import type {
  DisruptionInterval,
  ExposureBreakdownRow,
  ExposureConcentration,
  ExposureRecord,
  ExposureRiskMetrics,
  ExposureSummary,
  ExposureTotals,
  ImpactLevelRow,
} from "@/domain/exposure/exposure.types";
import { EMPTY_TOTALS, combineTotals, totalsOf } from "./estimateExposure";

const TOP_N_CONCENTRATION = 5;
const HHI_SCALE = 10_000;

/**
 * Severity score terms: payout-plus-admin points (capped), a multiplier growing with each affected
 * airport by its peak threshold, and a factor for how many airports are hit (capped).
 */
const SEVERITY = {
  usdPerPoint: 100_000,
  maxExposurePoints: 50,
  airportWeightByPeak: { 34: 0.1, 50: 0.2, 64: 0.3 } satisfies Record<WindThreshold, number>,
  airportsForFullSpread: 10,
  maxSpreadFactor: 1.5,
  maxScore: 100,
};

export type SummarizeOptions = {
  /** Region lookup for byRegion; records of unknown airports fall under "Other". */
  airports?: readonly Airport[];
  /** Intervals behind the records; needed for byPeakWindThreshold and the severity score. */
  intervals?: readonly DisruptionInterval[];
  administrativeCostRate: number;
};

type KeyedRow<K extends string> = ExposureBreakdownRow & { key: K };

const compareKeys = (a: { key: string }, b: { key: string }) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0);

function breakdown<K extends string>(records: readonly ExposureRecord[], keyOf: (r: ExposureRecord) => K): KeyedRow<K>[] {
  const rows = new Map<K, KeyedRow<K>>();
  for (const r of records) {
    const key = keyOf(r);
    const prev = rows.get(key) ?? { key, recordCount: 0, ...EMPTY_TOTALS };
    rows.set(key, { key, recordCount: prev.recordCount + 1, ...combineTotals(prev, r) });
  }
  // Largest payout first, ties by key.
  return [...rows.values()].sort(
    (a, b) => b.expectedPayoutUsd - a.expectedPayoutUsd || compareKeys(a, b)
  );
}

function computeConcentration(byAirport: readonly ExposureBreakdownRow[], total: number): ExposureConcentration {
  if (total <= 0 || !Number.isFinite(total)) return { hhi: 0, top5Share: 0, maxSingleAirportShare: 0 };

  const shares = byAirport
    .map((row) => row.expectedPayoutUsd / total)
    .filter((s) => Number.isFinite(s) && s > 0)
    .sort((a, b) => b - a);
  const top5Share = Math.min(1, shares.slice(0, TOP_N_CONCENTRATION).reduce((s, v) => s + v, 0));
  const hhi = Math.min(HHI_SCALE, shares.reduce((s, v) => s + v * v, 0) * HHI_SCALE);
  return { hhi, top5Share, maxSingleAirportShare: shares[0] ?? 0 };
}

const pairKey = (stormId: string, airportCode: string) => `${stormId}\u0000${airportCode}`;

/** Highest threshold of any interval of the (storm, airport) pair behind each record. */
function peakByPair(intervals: readonly DisruptionInterval[]): Map<string, WindThreshold> {
  const peaks = new Map<string, WindThreshold>();
  for (const i of intervals) {
    const key = pairKey(i.stormId, i.airportCode);
    const prev = peaks.get(key);
    if (prev === undefined || i.peakWindThresholdKt > prev) peaks.set(key, i.peakWindThresholdKt);
  }
  return peaks;
}

function byPeakWindThreshold(
  records: readonly ExposureRecord[],
  peaks: ReadonlyMap<string, WindThreshold>
): ImpactLevelRow[] {
  const rows = new Map<WindThreshold, ImpactLevelRow>();
  const airportsByPeak = new Map<WindThreshold, Set<string>>();
  for (const r of records) {
    const peak = peaks.get(pairKey(r.stormId, r.airportCode));
    if (peak === undefined) continue;
    const codes = airportsByPeak.get(peak) ?? new Set<string>();
    codes.add(r.airportCode);
    airportsByPeak.set(peak, codes);
    const prev = rows.get(peak) ?? { key: `${peak}kt` as const, recordCount: 0, airportCount: 0, ...EMPTY_TOTALS };
    rows.set(peak, { key: prev.key, recordCount: prev.recordCount + 1, airportCount: codes.size, ...combineTotals(prev, r) });
  }
  return [...rows.entries()].sort(([a], [b]) => b - a).map(([, row]) => row);
}

function computeRiskMetrics(
  records: readonly ExposureRecord[],
  totals: ExposureTotals,
  totalExposureUsd: number,
  peaks: ReadonlyMap<string, WindThreshold>
): ExposureRiskMetrics {
  const airportPeak = new Map<string, WindThreshold | null>();
  for (const r of records) {
    if (!(r.travelersAtRisk > 0)) continue;
    const peak = peaks.get(pairKey(r.stormId, r.airportCode)) ?? null;
    const prev = airportPeak.get(r.airportCode) ?? null;
    airportPeak.set(r.airportCode, prev === null || (peak !== null && peak > prev) ? peak : prev);
  }
  const affectedAirports = airportPeak.size;

  let multiplier = 1;
  for (const peak of airportPeak.values()) {
    if (peak !== null) multiplier += SEVERITY.airportWeightByPeak[peak];
  }
  const exposurePoints = Math.min(SEVERITY.maxExposurePoints, totalExposureUsd / SEVERITY.usdPerPoint);
  const spread = Math.min(SEVERITY.maxSpreadFactor, affectedAirports / SEVERITY.airportsForFullSpread);
  const severityScore = Math.min(SEVERITY.maxScore, exposurePoints * multiplier * spread);

  return {
    affectedAirports,
    exposurePerTravelerUsd: totalExposureUsd / Math.max(1, totals.travelersAtRisk),
    exposurePerAirportUsd: totalExposureUsd / Math.max(1, affectedAirports),
    severityScore: Number.isFinite(severityScore) ? severityScore : 0,
  };
}

export function summarizeExposure(records: readonly ExposureRecord[], options: SummarizeOptions): ExposureSummary {
  const regionByCode = new Map<string, Region>((options.airports ?? []).map((a) => [a.code, airportRegion(a)]));
  const totals = totalsOf(records);
  const administrativeCostUsd = totals.expectedPayoutUsd * options.administrativeCostRate;
  const totalExposureUsd = totals.expectedPayoutUsd + administrativeCostUsd;
  const peaks = peakByPair(options.intervals ?? []);

  const byAirport = breakdown(records, (r) => r.airportCode);
  const byRegion = breakdown<Region>(records, (r) => regionByCode.get(r.airportCode) ?? "Other");

  return {
    totals,
    administrativeCostUsd,
    totalExposureUsd,
    byAirport,
    byStorm: breakdown(records, (r) => r.stormId),
    byDate: breakdown(records, (r) => r.date).sort(compareKeys),
    byRegion,
    byPeakWindThreshold: byPeakWindThreshold(records, peaks),
    concentration: computeConcentration(byAirport, totals.expectedPayoutUsd),
    riskMetrics: computeRiskMetrics(records, totals, totalExposureUsd, peaks),
  };
}
