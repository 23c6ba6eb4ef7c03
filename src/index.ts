/**
 * Storm exposure engine: forecast tracks → impact zones → airport disruption → travelers at risk → insurance exposure.
 */

export { runExposurePipeline, prepareAirports } from "@/engine/pipeline";
export type { ExposurePipelineInput, ExposurePipelineResult, PreparedAirports } from "@/engine/pipeline";

export * from "@/engine/trackStore";
export * from "@/engine/zoneBuilder";
export * from "@/engine/exposureMatcher";
export * from "@/engine/travelerAggregator";
export * from "@/engine/insuranceExposure";

export * from "@/domain/errors";
export * from "@/domain/storm/storm.schema";
export * from "@/domain/airport/airport.schema";
export type * from "@/domain/exposure/exposure.types";

export {
  DEFAULT_EXPOSURE_CONFIG,
  DEFAULT_POLICY_PARAMS,
  ExposureConfigSchema,
  resolveExposureConfig,
  validatePolicyParams,
} from "@/config/exposureDefaults";
export type { ExposureConfig, PolicyParams } from "@/config/exposureDefaults";
export { getStormCategory, stormCategoryThresholds } from "@/config/stormCategories";
export type { StormCategory } from "@/config/stormCategories";

export { loadReferenceAirports, findReferenceAirport } from "@/data/airports";
export { parseForecastCsv } from "@/lib/forecastCsv";
export type { ParseForecastCsvResult, RejectedCsvRow } from "@/lib/forecastCsv";
export { formatExposureReport, buildExposureWorkbook, exposureWorkbookToBuffer } from "@/lib/exposureReport";
export type { ReportOptions } from "@/lib/exposureReport";
export { haversineKm, destinationPoint, EARTH_RADIUS_KM } from "@/lib/geo";
export type { LatLon } from "@/lib/geo";
