export { matchAirports, matchAirportToStorm, classifyAirport, classifyPoint, BOUNDARY_TOLERANCE_KM } from "./matchAirports";
export type { MatchResult } from "./matchAirports";
