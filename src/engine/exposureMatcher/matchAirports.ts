/**
 * Exposure Matcher: walks each storm's zones in time order and emits one DisruptionInterval
 * per contiguous in-zone run per airport (pure, deterministic).
 * Membership is great-circle distance to member circle centres; boundaries are inside.
 */

import type { Airport } from "@/domain/airport/airport.schema";
import type { DisruptionInterval, ImpactZone, WindRing } from "@/domain/exposure/exposure.types";
import type { WindThreshold } from "@/domain/storm/storm.schema";
import { haversineKm } from "@/lib/geo";
import type { LatLon } from "@/lib/geo";
import { hoursBetween } from "@/lib/time";
import { dlog, dwarn } from "@/lib/debug";

/** Absorbs rounding in the haversine so centre and boundary points stay inside. */
export const BOUNDARY_TOLERANCE_KM = 1e-9;

const INNER_FIRST: readonly WindThreshold[] = [64, 50, 34];

export type MatchResult = {
  intervals: DisruptionInterval[];
  warnings: string[];
};

/** Smallest distance from point to any circle centre in the ring that contains it, or null if outside. */
function ringHit(point: LatLon, ring: WindRing): number | null {
  let best: number | null = null;
  for (const c of ring.circles) {
    const d = haversineKm(point, c);
    if (d <= c.radiusKm + BOUNDARY_TOLERANCE_KM && (best === null || d < best)) best = d;
  }
  return best;
}

/**
 * Highest wind threshold whose ring contains the point, with distance to the nearest 34 kt centre.
 * A point outside the 34 kt ring is outside the zone.
 */
export function classifyPoint(point: LatLon, zone: ImpactZone): { thresholdKt: WindThreshold; distanceKm: number } | null {
  const distanceKm = ringHit(point, zone.rings[34]);
  if (distanceKm === null) return null;
  for (const kt of INNER_FIRST) {
    if (kt === 34 || ringHit(point, zone.rings[kt]) !== null) return { thresholdKt: kt, distanceKm };
  }
  return { thresholdKt: 34, distanceKm };
}

export function classifyAirport(airport: Airport, zone: ImpactZone): WindThreshold | null {
  return classifyPoint(airport, zone)?.thresholdKt ?? null;
}

type OpenRun = {
  startTime: string;
  lastInTime: string;
  peak: WindThreshold;
  closestKm: number;
};

function closeRun(airport: Airport, stormId: string, run: OpenRun, endTime: string): DisruptionInterval {
  return {
    airportCode: airport.code,
    stormId,
    startTime: run.startTime,
    endTime,
    durationHours: hoursBetween(Date.parse(run.startTime), Date.parse(endTime)),
    peakWindThresholdKt: run.peak,
    closestApproachKm: run.closestKm,
  };
}

/**
 * Intervals for one airport against one storm's zones (already in validTime order).
 * A run ends at the first later zone where the airport is outside every ring; a run still open at the
 * final zone ends at its last in-zone valid time.
 */
export function matchAirportToStorm(airport: Airport, stormId: string, zones: readonly ImpactZone[]): DisruptionInterval[] {
  const out: DisruptionInterval[] = [];
  let run: OpenRun | null = null;

  for (const zone of zones) {
    const hit = classifyPoint(airport, zone);
    if (hit) {
      if (!run) {
        run = { startTime: zone.validTime, lastInTime: zone.validTime, peak: hit.thresholdKt, closestKm: hit.distanceKm };
      } else {
        run.lastInTime = zone.validTime;
        if (hit.thresholdKt > run.peak) run.peak = hit.thresholdKt;
        if (hit.distanceKm < run.closestKm) run.closestKm = hit.distanceKm;
      }
    } else if (run) {
      out.push(closeRun(airport, stormId, run, zone.validTime));
      run = null;
    }
  }
  if (run) out.push(closeRun(airport, stormId, run, run.lastInTime));
  return out;
}

function zoneIsUsable(zone: ImpactZone): boolean {
  return (
    Number.isFinite(Date.parse(zone.validTime)) &&
    [zone.rings[34], zone.rings[50], zone.rings[64]].every((ring) =>
      ring.circles.every((c) => Number.isFinite(c.latitude) && Number.isFinite(c.longitude) && Number.isFinite(c.radiusKm))
    )
  );
}

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Matches every airport against every storm. Storms and airports are independent units of work;
 * unusable zones and airports are skipped with a warning.
 * Output is sorted by (stormId, airportCode, startTime).
 */
export function matchAirports(zones: readonly ImpactZone[], airports: readonly Airport[]): MatchResult {
  const warnings: string[] = [];

  const byStorm = new Map<string, ImpactZone[]>();
  for (const zone of zones) {
    if (!zoneIsUsable(zone)) {
      warnings.push(`[${zone.stormId}] unusable zone at ${zone.validTime}, skipped`);
      continue;
    }
    const list = byStorm.get(zone.stormId);
    if (list) list.push(zone);
    else byStorm.set(zone.stormId, [zone]);
  }

  const usableAirports = airports.filter((a) => {
    const ok = Number.isFinite(a.latitude) && Number.isFinite(a.longitude);
    if (!ok) warnings.push(`[${a.code}] airport has non-finite coordinates, skipped`);
    return ok;
  });

  const intervals: DisruptionInterval[] = [];
  for (const [stormId, stormZones] of byStorm) {
    const ordered = [...stormZones].sort((a, b) => Date.parse(a.validTime) - Date.parse(b.validTime));
    for (const airport of usableAirports) {
      intervals.push(...matchAirportToStorm(airport, stormId, ordered));
    }
  }

  intervals.sort(
    (a, b) =>
      compareStrings(a.stormId, b.stormId) ||
      compareStrings(a.airportCode, b.airportCode) ||
      Date.parse(a.startTime) - Date.parse(b.startTime)
  );

  for (const w of warnings) dwarn(`[exposureMatcher] ${w}`);
  dlog("[exposureMatcher] matched", { storms: byStorm.size, airports: usableAirports.length, intervals: intervals.length });

  return { intervals, warnings };
}
