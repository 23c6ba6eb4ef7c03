/**
 * Per-member track summary for reports and dashboards.
 */

import type { Trajectory } from "@/domain/storm/storm.schema";
import { getStormCategory } from "@/config/stormCategories";
import type { StormCategory } from "@/config/stormCategories";
import { haversineKm } from "@/lib/geo";
import { hoursBetween } from "@/lib/time";

export type TrajectorySummary = {
  stormId: string;
  memberId: string;
  sampleCount: number;
  startTime: string;
  endTime: string;
  durationHours: number;
  trackLengthKm: number;
  peakWindKt: number | null;
  minPressureHpa: number | null;
  peakCategory: StormCategory | "unknown";
};

export function summarizeTrajectory(trajectory: Trajectory): TrajectorySummary {
  const { samples } = trajectory;
  const first = samples[0];
  const last = samples[samples.length - 1];

  let trackLengthKm = 0;
  for (let i = 1; i < samples.length; i++) {
    const prev = samples[i - 1];
    const curr = samples[i];
    if (prev && curr) trackLengthKm += haversineKm(prev, curr);
  }

  const winds = samples.map((s) => s.maxSustainedWindKt).filter((w): w is number => w !== undefined);
  const pressures = samples.map((s) => s.centralPressureHpa).filter((p): p is number => p !== undefined);
  const peakWindKt = winds.length > 0 ? Math.max(...winds) : null;

  return {
    stormId: trajectory.stormId,
    memberId: trajectory.memberId,
    sampleCount: samples.length,
    startTime: first?.validTime ?? "",
    endTime: last?.validTime ?? "",
    durationHours: first && last ? hoursBetween(Date.parse(first.validTime), Date.parse(last.validTime)) : 0,
    trackLengthKm,
    peakWindKt,
    minPressureHpa: pressures.length > 0 ? Math.min(...pressures) : null,
    peakCategory: peakWindKt === null ? "unknown" : getStormCategory(peakWindKt),
  };
}
