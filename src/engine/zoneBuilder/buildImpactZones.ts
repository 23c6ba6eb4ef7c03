/**
 * Zone Builder: one ImpactZone per (storm, validTime), unioning every member's wind circles (pure, deterministic).
 * Geometry is kept as the exact set of member circles; membership is tested with great-circle distance.
 */

import { WIND_THRESHOLDS } from "@/domain/storm/storm.schema";
import type { InitTimes, TrackSample, Trajectory, WindThreshold } from "@/domain/storm/storm.schema";
import type { ImpactZone, WindRing, ZoneCircle } from "@/domain/exposure/exposure.types";
import { meanSpreadKm } from "@/lib/geo";
import { hoursBetween, parseUtcTimestamp, toIsoUtc } from "@/lib/time";
import { dlog, dwarn } from "@/lib/debug";
import { uncertaintyRadiusKm } from "./uncertainty";
import type { UncertaintyParams } from "./uncertainty";

export type ZoneBuilderResult = {
  zones: ImpactZone[];
  warnings: string[];
};

/**
 * Per-member radii with nesting enforced: r64 ≤ r50 ≤ r34.
 * Missing radii count as 0 here, and a 0 radius contributes no circle.
 */
export function nestedWindRadii(sample: TrackSample): Record<WindThreshold, number> {
  const r64 = sample.windRadius64Km ?? 0;
  const r50 = Math.max(sample.windRadius50Km ?? 0, r64);
  const r34 = Math.max(sample.windRadius34Km ?? 0, r50);
  return { 34: r34, 50: r50, 64: r64 };
}

function buildRings(samples: readonly TrackSample[], uncertaintyKm: number): Record<WindThreshold, WindRing> {
  const circles: Record<WindThreshold, ZoneCircle[]> = { 34: [], 50: [], 64: [] };
  for (const s of samples) {
    const radii = nestedWindRadii(s);
    for (const kt of WIND_THRESHOLDS) {
      const r = radii[kt];
      if (r <= 0) continue;
      circles[kt].push({ memberId: s.memberId, latitude: s.latitude, longitude: s.longitude, radiusKm: r + uncertaintyKm });
    }
  }
  return {
    34: { thresholdKt: 34, circles: circles[34] },
    50: { thresholdKt: 50, circles: circles[50] },
    64: { thresholdKt: 64, circles: circles[64] },
  };
}

function ringsAreFinite(rings: Record<WindThreshold, WindRing>): boolean {
  return WIND_THRESHOLDS.every((kt) =>
    rings[kt].circles.every(
      (c) => Number.isFinite(c.latitude) && Number.isFinite(c.longitude) && Number.isFinite(c.radiusKm)
    )
  );
}

function resolveInitMs(stormId: string, initTimes: InitTimes, earliestMs: number, warnings: string[]): number {
  const raw = initTimes[stormId];
  if (raw !== undefined) {
    const ms = parseUtcTimestamp(raw);
    if (ms !== null) return ms;
    warnings.push(`[${stormId}] initTime "${raw}" unparseable, using earliest valid time`);
  } else {
    warnings.push(`[${stormId}] no initTime supplied, using earliest valid time`);
  }
  return earliestMs;
}

/** Zones for one storm, in validTime order. uncertaintyRadiusKm is ratcheted so it never decreases. */
function buildStormZones(
  stormId: string,
  trajectories: readonly Trajectory[],
  initTimes: InitTimes,
  params: UncertaintyParams,
  warnings: string[]
): ImpactZone[] {
  const byTime = new Map<number, TrackSample[]>();
  for (const t of trajectories) {
    for (const s of t.samples) {
      const ms = Date.parse(s.validTime);
      const list = byTime.get(ms);
      if (list) list.push(s);
      else byTime.set(ms, [s]);
    }
  }
  const times = [...byTime.keys()].sort((a, b) => a - b);
  const earliest = times[0];
  if (earliest === undefined) return [];

  const initMs = resolveInitMs(stormId, initTimes, earliest, warnings);
  const zones: ImpactZone[] = [];
  let floorKm = 0;

  for (const ms of times) {
    const samples = byTime.get(ms) ?? [];
    const validTime = toIsoUtc(ms);
    if (samples.length === 0) {
      warnings.push(`[${stormId}] no members at ${validTime}, zone skipped`);
      continue;
    }

    const leadTimeHours = Math.max(0, hoursBetween(initMs, ms));
    const spreadKm = params.spreadUncertaintyFactor > 0 ? meanSpreadKm(samples) : 0;
    const raw = uncertaintyRadiusKm(leadTimeHours, spreadKm, params);
    if (!Number.isFinite(raw)) {
      warnings.push(`[${stormId}] non-finite uncertainty at ${validTime}, zone skipped`);
      continue;
    }
    const uncertaintyKm = Math.max(raw, floorKm);

    const rings = buildRings(samples, uncertaintyKm);
    if (!ringsAreFinite(rings)) {
      warnings.push(`[${stormId}] non-finite geometry at ${validTime}, zone skipped`);
      continue;
    }

    floorKm = uncertaintyKm;
    zones.push({
      stormId,
      validTime,
      leadTimeHours,
      uncertaintyRadiusKm: uncertaintyKm,
      memberCount: samples.length,
      rings,
    });
  }
  return zones;
}

/**
 * Builds zones for every storm. A storm's full zone sequence is complete before it is returned,
 * so matchers can walk it read-only. Output is ordered by stormId, then validTime.
 */
export function buildImpactZones(
  trajectories: readonly Trajectory[],
  initTimes: InitTimes,
  params: UncertaintyParams
): ZoneBuilderResult {
  const warnings: string[] = [];
  const byStorm = new Map<string, Trajectory[]>();
  for (const t of trajectories) {
    const list = byStorm.get(t.stormId);
    if (list) list.push(t);
    else byStorm.set(t.stormId, [t]);
  }

  const stormIds = [...byStorm.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const zones = stormIds.flatMap((id) => buildStormZones(id, byStorm.get(id) ?? [], initTimes, params, warnings));

  for (const w of warnings) dwarn(`[zoneBuilder] ${w}`);
  dlog("[zoneBuilder] built", { storms: stormIds.length, zones: zones.length });

  return { zones, warnings };
}
