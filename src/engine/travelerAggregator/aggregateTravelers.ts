/**
 * Traveler Aggregator: prorates each disruption interval over the airport's local days
 * and converts coverage into travelers at risk (pure, deterministic).
 */

import type { Airport } from "@/domain/airport/airport.schema";
import type { DisruptionInterval, TravelerDay } from "@/domain/exposure/exposure.types";
import type { ExposureConfig } from "@/config/exposureDefaults";
import { clamp01 } from "@/lib/numbers";
import { dlog, dwarn } from "@/lib/debug";
import { localDaysSpanning } from "./localDay";
import { resolveAirportTimeZone } from "./airportTimeZone";
import { baselineTravelersFor } from "./seasonality";

export type AggregationParams = Pick<ExposureConfig, "minDisruptionHours" | "applySeasonality">;

export type AggregationResult = {
  travelerDays: TravelerDay[];
  warnings: string[];
};

type DayShare = { date: string; overlapFraction: number };

/** Coverage of each local day by the interval: overlap / local day length, clamped to [0, 1]. */
export function intervalDayShares(interval: DisruptionInterval, timeZone: string): DayShare[] {
  const startMs = Date.parse(interval.startTime);
  const endMs = Date.parse(interval.endTime);
  return localDaysSpanning(startMs, endMs, timeZone).map((day) => {
    const overlap = Math.max(0, Math.min(endMs, day.endMs) - Math.max(startMs, day.startMs));
    return { date: day.date, overlapFraction: clamp01(overlap / (day.endMs - day.startMs)) };
  });
}

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * One TravelerDay per (airport, storm, local date); rows from several intervals are summed.
 * Intervals shorter than minDisruptionHours contribute zero travelers (belowTrigger).
 */
export function aggregateTravelers(
  intervals: readonly DisruptionInterval[],
  airports: readonly Airport[],
  params: AggregationParams
): AggregationResult {
  const warnings: string[] = [];
  const airportByCode = new Map(airports.map((a) => [a.code, a]));
  const rows = new Map<string, TravelerDay>();
  const zoneByCode = new Map<string, string>();

  const timeZoneOf = (airport: Airport): string => {
    const known = zoneByCode.get(airport.code);
    if (known !== undefined) return known;
    const resolved = resolveAirportTimeZone(airport);
    if (resolved.warning) warnings.push(resolved.warning);
    zoneByCode.set(airport.code, resolved.timeZone);
    return resolved.timeZone;
  };

  for (const interval of intervals) {
    const airport = airportByCode.get(interval.airportCode);
    if (!airport) {
      warnings.push(`[${interval.airportCode}] no airport reference for interval of ${interval.stormId}, skipped`);
      continue;
    }
    const timeZone = timeZoneOf(airport);

    const belowTrigger = interval.durationHours < params.minDisruptionHours;

    for (const share of intervalDayShares(interval, timeZone)) {
      const baselineTravelers = baselineTravelersFor(airport, share.date, params.applySeasonality);
      const travelersAtRisk = belowTrigger ? 0 : baselineTravelers * share.overlapFraction;
      const key = `${interval.stormId}\u0000${airport.code}\u0000${share.date}`;
      const prev = rows.get(key);
      rows.set(
        key,
        prev
          ? {
              ...prev,
              overlapFraction: clamp01(prev.overlapFraction + share.overlapFraction),
              travelersAtRisk: prev.travelersAtRisk + travelersAtRisk,
              belowTrigger: prev.belowTrigger && belowTrigger,
            }
          : {
              airportCode: airport.code,
              stormId: interval.stormId,
              date: share.date,
              overlapFraction: share.overlapFraction,
              baselineTravelers,
              travelersAtRisk,
              belowTrigger,
            }
      );
    }
  }

  const travelerDays = [...rows.values()].sort(
    (a, b) =>
      compareStrings(a.stormId, b.stormId) || compareStrings(a.airportCode, b.airportCode) || compareStrings(a.date, b.date)
  );

  for (const w of warnings) dwarn(`[travelerAggregator] ${w}`);
  dlog("[travelerAggregator] aggregated", { intervals: intervals.length, travelerDays: travelerDays.length });

  return { travelerDays, warnings };
}
