/**
 * Dev harness for the exposure pipeline against the reference airport set.
 * Run from repo root: npx tsx __dev__/pipelineCheck.ts [workbook.xlsx]
 */

import { writeFileSync } from "node:fs";
import { loadReferenceAirports } from "../src/data/airports";
import { runExposurePipeline } from "../src/engine/pipeline";
import { summarizeTrajectory } from "../src/engine/trackStore";
import { FIXTURE_INIT_TIME, ensembleSamples, miamiFullDaySamples } from "../src/dev/fixtures";
import { runAllChecks } from "../src/dev/healthChecks";
import { buildExposureWorkbook, exposureWorkbookToBuffer, formatExposureReport } from "../src/lib/exposureReport";

function assert(condition: boolean, message: string): void {
  if (!condition) throw new Error(`Assert failed: ${message}`);
}

function assertApprox(actual: number, expected: number, tolerance: number, label: string): void {
  const ok = Math.abs(actual - expected) <= tolerance;
  if (!ok) throw new Error(`${label}: expected ≈ ${expected}, got ${actual}`);
}

function runChecks(): void {
  const airports = loadReferenceAirports();

  // --- single storm parked over Miami for one local day
  const single = runExposurePipeline({
    samples: miamiFullDaySamples,
    initTimes: { AL09: FIXTURE_INIT_TIME },
    airports: airports.filter((a) => a.code === "MIA"),
  });
  assertApprox(single.summary.totals.expectedPayoutUsd, 300_000, 1e-6, "MIA full day payout");

  // --- ensemble against every reference airport
  const result = runExposurePipeline({
    samples: ensembleSamples,
    initTimes: { AL14: FIXTURE_INIT_TIME },
    airports,
    config: { applySeasonality: true },
  });
  assert(result.zones.length > 0, "zones built");
  assert(result.intervals.length > 0, "ensemble disrupts at least one airport");
  assert(result.summary.totals.expectedPayoutUsd > 0, "ensemble payout positive");

  for (const t of result.trajectories) {
    const s = summarizeTrajectory(t);
    console.log(`${t.stormId}/${t.memberId}: ${s.durationHours} h, ${s.trackLengthKm.toFixed(0)} km, ${s.peakCategory}`);
  }
  console.log(formatExposureReport(result, { airports, generatedAt: new Date().toISOString() }));

  const health = runAllChecks();
  const failed = health.results.filter((r) => r.status === "fail");
  for (const r of health.results) console.log(`[${r.status}] ${r.group}: ${r.name}`);
  assert(failed.length === 0, `${failed.length} health checks failed`);

  const out = process.argv[2];
  if (out) {
    writeFileSync(out, exposureWorkbookToBuffer(buildExposureWorkbook(result)));
    console.log(`Workbook written to ${out}`);
  }

  console.log("All pipeline checks passed.");
}

runChecks();
