/**
 * Optional traveler-volume scaling: regional month × holiday × day of week.
 */

import { z } from "zod";
import seasonalityJson from "@/data/travelSeasonality.json";
import { RegionSchema } from "@/domain/airport/airport.schema";
import type { Airport } from "@/domain/airport/airport.schema";
import { airportRegion } from "@/domain/airport/airport.schema";
import { HOLIDAY_PERIODS, holidayPeriodsOn } from "./holidays";

const TwelveFactors = z.array(z.number().positive()).length(12);

const SeasonalitySchema = z.object({
  monthlyByRegion: z.record(RegionSchema, TwelveFactors),
  /** Sunday = 0 … Saturday = 6. */
  dayOfWeek: z.array(z.number().positive()).length(7),
  holidays: z.record(z.enum(HOLIDAY_PERIODS), z.number().positive()),
});
export type SeasonalityTable = z.infer<typeof SeasonalitySchema>;

export const TRAVEL_SEASONALITY: SeasonalityTable = SeasonalitySchema.parse(seasonalityJson);

/**
 * Overlapping periods do not compound: the largest applies (Dec 31 is Christmas week at 2.0, not
 * Christmas × New Year). Outside every period the factor is 1.
 */
export function holidayFactor(date: string, table: SeasonalityTable = TRAVEL_SEASONALITY): number {
  const factors = holidayPeriodsOn(date).map((period) => table.holidays[period] ?? 1);
  return factors.length ? Math.max(...factors) : 1;
}

/** Multiplier for a local date (YYYY-MM-DD) at an airport. Missing entries count as 1. */
export function seasonalityFactor(airport: Airport, date: string, table: SeasonalityTable = TRAVEL_SEASONALITY): number {
  const month = Number(date.slice(5, 7));
  const weekday = new Date(`${date}T00:00:00Z`).getUTCDay();
  const monthly = table.monthlyByRegion[airportRegion(airport)]?.[month - 1] ?? 1;
  const dow = table.dayOfWeek[weekday] ?? 1;
  return monthly * holidayFactor(date, table) * dow;
}

export function baselineTravelersFor(airport: Airport, date: string, applySeasonality: boolean): number {
  const base = airport.baselineDailyTravelers;
  return applySeasonality ? base * seasonalityFactor(airport, date) : base;
}
