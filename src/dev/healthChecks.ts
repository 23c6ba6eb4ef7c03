/**
 * Dev-only Engine Health check registry.
 * Grouped by: Track Store, Zone Geometry, Exposure Matching, Traveler Days, Insurance Math, Determinism, Configuration.
 * Deterministic invariants only; no hard-coded expected numbers.
 */

import type { WindThreshold } from "@/domain/storm/storm.schema";
import type { ImpactZone } from "@/domain/exposure/exposure.types";
import { ConfigurationError } from "@/domain/errors";
import { resolveExposureConfig, DEFAULT_POLICY_PARAMS } from "@/config/exposureDefaults";
import { buildTrajectories } from "@/engine/trackStore";
import { intervalDayShares } from "@/engine/travelerAggregator";
import { estimateExposure, totalPayout } from "@/engine/insuranceExposure";
import { runExposurePipeline } from "@/engine/pipeline";
import type { ExposurePipelineResult } from "@/engine/pipeline";
import { FIXTURE_INIT_TIME, edgeSamples, ensembleSamples, fixtureAirports } from "@/dev/fixtures";
import { allNonNegative, approxEqual, inClosed01, isNonDecreasing, sumApproxOne } from "@/dev/invariants";

export type CheckStatus = "pass" | "warn" | "fail";

export type CheckResult = {
  status: CheckStatus;
  message: string;
  details?: unknown;
};

export type CheckGroup =
  | "Track Store"
  | "Zone Geometry"
  | "Exposure Matching"
  | "Traveler Days"
  | "Insurance Math"
  | "Determinism"
  | "Configuration";

export type GroupedCheck = {
  group: CheckGroup;
  name: string;
  run: () => CheckResult;
};

const RING_NESTING: ReadonlyArray<readonly [WindThreshold, WindThreshold]> = [
  [64, 50],
  [50, 34],
];

function runEnsemble(): ExposurePipelineResult {
  return runExposurePipeline({
    samples: ensembleSamples,
    initTimes: { AL14: FIXTURE_INIT_TIME },
    airports: fixtureAirports,
  });
}

function zonesByStorm(zones: readonly ImpactZone[]): Map<string, ImpactZone[]> {
  const out = new Map<string, ImpactZone[]>();
  for (const z of zones) {
    const list = out.get(z.stormId);
    if (list) list.push(z);
    else out.set(z.stormId, [z]);
  }
  return out;
}

export const groupedHealthChecks: GroupedCheck[] = [
  // ---------- Track Store ----------
  {
    group: "Track Store",
    name: "Edge rows are rejected, not thrown",
    run: () => {
      try {
        const { trajectories, rejected } = buildTrajectories(edgeSamples);
        const details = { rejected: rejected.map((e) => e.message), trajectories: trajectories.length };
        if (rejected.length === 0) return { status: "fail", message: "expected malformed rows to be rejected", details };
        if (trajectories.length === 0) return { status: "fail", message: "valid edge rows were dropped", details };
        return { status: "pass", message: `${rejected.length} rows rejected; valid rows kept`, details };
      } catch (e) {
        return { status: "fail", message: `track store threw: ${e instanceof Error ? e.message : String(e)}` };
      }
    },
  },
  {
    group: "Track Store",
    name: "Trajectory samples strictly increase in validTime",
    run: () => {
      const errors: string[] = [];
      for (const t of runEnsemble().trajectories) {
        const times = t.samples.map((s) => Date.parse(s.validTime));
        if (times.some((v, i) => i > 0 && v <= (times[i - 1] ?? v))) errors.push(`${t.stormId}/${t.memberId}`);
      }
      if (errors.length > 0) return { status: "fail", message: `unordered: ${errors.join(", ")}`, details: { errors } };
      return { status: "pass", message: "every trajectory strictly increasing" };
    },
  },
  // ---------- Zone Geometry ----------
  {
    group: "Zone Geometry",
    name: "Rings nest per member (64 ⊆ 50 ⊆ 34)",
    run: () => {
      const errors: string[] = [];
      for (const zone of runEnsemble().zones) {
        for (const [inner, outer] of RING_NESTING) {
          for (const c of zone.rings[inner].circles) {
            const containing = zone.rings[outer].circles.find((o) => o.memberId === c.memberId && o.radiusKm >= c.radiusKm);
            if (!containing) errors.push(`${zone.validTime} member ${c.memberId}: ${inner} kt not inside ${outer} kt`);
          }
        }
      }
      if (errors.length > 0) return { status: "fail", message: errors.join("; "), details: { errors } };
      return { status: "pass", message: "inner ring circles contained in outer ring circles" };
    },
  },
  {
    group: "Zone Geometry",
    name: "Uncertainty radius non-decreasing with lead time",
    run: () => {
      const errors: string[] = [];
      for (const [stormId, zones] of zonesByStorm(runEnsemble().zones)) {
        if (!isNonDecreasing(zones.map((z) => z.uncertaintyRadiusKm))) errors.push(stormId);
        if (!isNonDecreasing(zones.map((z) => z.leadTimeHours))) errors.push(`${stormId} (lead)`);
      }
      if (errors.length > 0) return { status: "fail", message: `decreasing: ${errors.join(", ")}`, details: { errors } };
      return { status: "pass", message: "uncertainty ratchets with lead time" };
    },
  },
  // ---------- Exposure Matching ----------
  {
    group: "Exposure Matching",
    name: "Intervals are well-formed and never overlap per airport",
    run: () => {
      const { intervals } = runEnsemble();
      const errors: string[] = [];
      const lastEnd = new Map<string, number>();
      for (const iv of intervals) {
        const start = Date.parse(iv.startTime);
        const end = Date.parse(iv.endTime);
        if (!(end >= start)) errors.push(`${iv.airportCode}: end before start`);
        if (!allNonNegative([iv.durationHours, iv.closestApproachKm])) errors.push(`${iv.airportCode}: negative or non-finite`);
        const key = `${iv.stormId}/${iv.airportCode}`;
        const prev = lastEnd.get(key);
        if (prev !== undefined && start < prev) errors.push(`${key}: overlapping intervals`);
        lastEnd.set(key, end);
      }
      if (intervals.length === 0) return { status: "warn", message: "ensemble fixture produced no intervals" };
      if (errors.length > 0) return { status: "fail", message: errors.join("; "), details: { errors } };
      return { status: "pass", message: `${intervals.length} intervals well-formed` };
    },
  },
  // ---------- Traveler Days ----------
  {
    group: "Traveler Days",
    name: "Overlap fractions in [0, 1]",
    run: () => {
      const bad = runEnsemble().travelerDays.filter((d) => !inClosed01(d.overlapFraction));
      if (bad.length > 0) return { status: "fail", message: `${bad.length} rows out of range`, details: { bad } };
      return { status: "pass", message: "all overlap fractions within [0, 1]" };
    },
  },
  {
    group: "Traveler Days",
    name: "24 h interval shares sum to 1 away from DST",
    run: () => {
      const shares = intervalDayShares(
        {
          airportCode: "MIA",
          stormId: "CHECK",
          startTime: "2024-09-26T16:00:00.000Z",
          endTime: "2024-09-27T16:00:00.000Z",
          durationHours: 24,
          peakWindThresholdKt: 34,
          closestApproachKm: 0,
        },
        "America/New_York"
      );
      const fractions = shares.map((s) => s.overlapFraction);
      if (!sumApproxOne(fractions)) return { status: "fail", message: "shares do not sum to 1", details: { shares } };
      return { status: "pass", message: `shares ${fractions.join(" + ")} = 1` };
    },
  },
  // ---------- Insurance Math ----------
  {
    group: "Insurance Math",
    name: "Payout is linear in travelers at risk",
    run: () => {
      const { travelerDays } = runEnsemble();
      const doubled = travelerDays.map((d) => ({ ...d, travelersAtRisk: d.travelersAtRisk * 2 }));
      const base = totalPayout(estimateExposure(travelerDays, DEFAULT_POLICY_PARAMS));
      const twice = totalPayout(estimateExposure(doubled, DEFAULT_POLICY_PARAMS));
      const details = { base, twice };
      if (!approxEqual(twice, 2 * base)) return { status: "fail", message: "doubling travelers did not double payout", details };
      return { status: "pass", message: "payout(2x) = 2 × payout(x)", details };
    },
  },
  {
    group: "Insurance Math",
    name: "Records non-negative and finite; summary matches records",
    run: () => {
      const { records, summary } = runEnsemble();
      const values = records.flatMap((r) => [r.travelersAtRisk, r.coverageHolders, r.expectedClaims, r.expectedPayoutUsd]);
      if (!allNonNegative(values)) return { status: "fail", message: "negative or non-finite record values" };
      if (!approxEqual(summary.totals.expectedPayoutUsd, totalPayout(records)))
        return { status: "fail", message: "summary total differs from record total" };
      return { status: "pass", message: `${records.length} records consistent with summary` };
    },
  },
  {
    group: "Insurance Math",
    name: "Peak-wind breakdown covers the total; severity within 0–100",
    run: () => {
      const { summary } = runEnsemble();
      const byPeak = summary.byPeakWindThreshold.reduce((s, row) => s + row.expectedPayoutUsd, 0);
      const { severityScore } = summary.riskMetrics;
      const details = { byPeak, total: summary.totals.expectedPayoutUsd, severityScore };
      if (!approxEqual(byPeak, summary.totals.expectedPayoutUsd))
        return { status: "fail", message: "peak-wind rows do not sum to the total", details };
      if (!(severityScore >= 0 && severityScore <= 100)) return { status: "fail", message: "severity out of range", details };
      return { status: "pass", message: `severity ${severityScore.toFixed(2)}`, details };
    },
  },
  // ---------- Determinism ----------
  {
    group: "Determinism",
    name: "Identical input serializes identically",
    run: () => {
      const a = JSON.stringify(runEnsemble());
      const b = JSON.stringify(runEnsemble());
      if (a !== b) return { status: "fail", message: "two runs differ" };
      return { status: "pass", message: "two runs byte-identical" };
    },
  },
  // ---------- Configuration ----------
  {
    group: "Configuration",
    name: "Out-of-range parameters fail fast",
    run: () => {
      try {
        resolveExposureConfig({ claimRate: 2 });
      } catch (e) {
        if (e instanceof ConfigurationError) return { status: "pass", message: e.message };
        return { status: "fail", message: `unexpected error: ${String(e)}` };
      }
      return { status: "fail", message: "claimRate 2 was accepted" };
    },
  },
];

export type RunResult = {
  results: Array<{ group: CheckGroup; name: string; status: CheckStatus; message: string; details?: unknown }>;
  durationMs: number;
};

export function runAllChecks(): RunResult {
  const start = performance.now();
  const results = groupedHealthChecks.map((c) => ({
    group: c.group,
    name: c.name,
    ...c.run(),
  }));
  const durationMs = performance.now() - start;
  return { results, durationMs };
}
