import type { Airport } from "@/domain/airport/airport.schema";
import { DEFAULT_AIRPORT_TIME_ZONE } from "@/domain/airport/airport.schema";
import { findReferenceAirport } from "@/data/airports";
import { isValidTimeZone } from "./localDay";

export type ResolvedTimeZone = {
  timeZone: string;
  /** Set whenever local days fall back to UTC. */
  warning?: string;
};

/**
 * IANA zone used to split an airport's intervals into local days.
 * Order: the airport's own timeZone, then the reference airport with the same code, then UTC.
 */
export function resolveAirportTimeZone(airport: Airport): ResolvedTimeZone {
  if (airport.timeZone !== undefined) {
    if (isValidTimeZone(airport.timeZone)) return { timeZone: airport.timeZone };
    return {
      timeZone: DEFAULT_AIRPORT_TIME_ZONE,
      warning: `[${airport.code}] unknown time zone "${airport.timeZone}", using UTC days`,
    };
  }

  const reference = findReferenceAirport(airport.code)?.timeZone;
  if (reference !== undefined && isValidTimeZone(reference)) return { timeZone: reference };

  return {
    timeZone: DEFAULT_AIRPORT_TIME_ZONE,
    warning: `[${airport.code}] no time zone and no reference airport, using UTC days`,
  };
}
