export { aggregateTravelers, intervalDayShares } from "./aggregateTravelers";
export type { AggregationParams, AggregationResult } from "./aggregateTravelers";
export { localDayBounds, localDaysSpanning, localDateOf, isValidTimeZone } from "./localDay";
export type { LocalDay } from "./localDay";
export { baselineTravelersFor, holidayFactor, seasonalityFactor, TRAVEL_SEASONALITY } from "./seasonality";
export { HOLIDAY_PERIODS, holidayPeriodsOn } from "./holidays";
export type { HolidayPeriod } from "./holidays";
export type { SeasonalityTable } from "./seasonality";
export { resolveAirportTimeZone } from "./airportTimeZone";
export type { ResolvedTimeZone } from "./airportTimeZone";
