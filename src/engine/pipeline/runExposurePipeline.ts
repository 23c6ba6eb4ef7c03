/**
 * End-to-end exposure run: track store → zones → intervals → traveler days → records → summary.
 * Configuration is resolved and airports validated before any stage runs; a bad parameter never
 * produces partial output.
 */

import type { Airport } from "@/domain/airport/airport.schema";
import type { InitTimes, Trajectory } from "@/domain/storm/storm.schema";
import type {
  DisruptionInterval,
  ExposureRecord,
  ExposureSummary,
  ImpactZone,
  TravelerDay,
} from "@/domain/exposure/exposure.types";
import type { MalformedSampleError } from "@/domain/errors";
import type { ExposureConfig } from "@/config/exposureDefaults";
import { resolveExposureConfig } from "@/config/exposureDefaults";
import { buildTrajectories } from "@/engine/trackStore";
import { buildImpactZones } from "@/engine/zoneBuilder";
import { matchAirports } from "@/engine/exposureMatcher";
import { aggregateTravelers } from "@/engine/travelerAggregator";
import { estimateExposure, summarizeExposure } from "@/engine/insuranceExposure";
import { dlog } from "@/lib/debug";
import { prepareAirports } from "./prepareAirports";

export type ExposurePipelineInput = {
  /** Raw track rows; validated by the track store. */
  samples: readonly unknown[];
  /** Forecast initialization time per stormId. */
  initTimes?: InitTimes;
  /** Airport reference records; invalid ones and repeated codes are skipped with a warning. */
  airports: readonly unknown[];
  config?: Partial<ExposureConfig>;
  /** Restrict the run to these storms; each must have valid samples. */
  stormIds?: readonly string[];
};

export type ExposurePipelineResult = {
  /** Airports that passed validation, in input order. */
  airports: Airport[];
  trajectories: Trajectory[];
  rejectedSamples: MalformedSampleError[];
  zones: ImpactZone[];
  intervals: DisruptionInterval[];
  travelerDays: TravelerDay[];
  records: ExposureRecord[];
  summary: ExposureSummary;
  config: ExposureConfig;
  warnings: string[];
};

export function runExposurePipeline(input: ExposurePipelineInput): ExposurePipelineResult {
  const config = resolveExposureConfig(input.config);
  const prepared = prepareAirports(input.airports);
  const airports = prepared.airports;

  const { trajectories, rejected } = buildTrajectories(input.samples, { stormIds: input.stormIds });
  const zoneResult = buildImpactZones(trajectories, input.initTimes ?? {}, config);
  const matchResult = matchAirports(zoneResult.zones, airports);
  const aggregation = aggregateTravelers(matchResult.intervals, airports, config);
  const records = estimateExposure(aggregation.travelerDays, config);
  const summary = summarizeExposure(records, {
    airports,
    intervals: matchResult.intervals,
    administrativeCostRate: config.administrativeCostRate,
  });

  const warnings = [...prepared.warnings, ...zoneResult.warnings, ...matchResult.warnings, ...aggregation.warnings];

  dlog("[pipeline] run complete", {
    trajectories: trajectories.length,
    rejected: rejected.length,
    airports: airports.length,
    zones: zoneResult.zones.length,
    intervals: matchResult.intervals.length,
    records: records.length,
    payoutUsd: summary.totals.expectedPayoutUsd,
    warnings: warnings.length,
  });

  return {
    airports,
    trajectories,
    rejectedSamples: rejected,
    zones: zoneResult.zones,
    intervals: matchResult.intervals,
    travelerDays: aggregation.travelerDays,
    records,
    summary,
    config,
    warnings,
  };
}
