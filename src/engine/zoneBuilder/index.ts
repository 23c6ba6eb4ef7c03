export { buildImpactZones, nestedWindRadii } from "./buildImpactZones";
export type { ZoneBuilderResult } from "./buildImpactZones";
export { uncertaintyRadiusKm } from "./uncertainty";
export type { UncertaintyParams } from "./uncertainty";
export { circleToPolygon, ringToMultiPolygon, zoneRingPolygons, DEFAULT_POLYGON_SEGMENTS } from "./ringPolygons";
export type { MultiPolygonGeometry, Position } from "./ringPolygons";
