/**
 * Default Atlantic-basin airport reference set.
 */

import { z } from "zod";
import airportsJson from "./atlanticAirports.json";
import { AirportSchema } from "@/domain/airport/airport.schema";
import type { Airport } from "@/domain/airport/airport.schema";

const AirportListSchema = z.array(AirportSchema);

let cached: Airport[] | null = null;

/** Parsed and validated once; callers get a fresh array. */
export function loadReferenceAirports(): Airport[] {
  if (!cached) cached = AirportListSchema.parse(airportsJson);
  return [...cached];
}

export function findReferenceAirport(code: string): Airport | undefined {
  const wanted = code.trim().toUpperCase();
  return loadReferenceAirports().find((a) => a.code === wanted);
}
