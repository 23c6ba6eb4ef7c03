import { z } from "zod";

export const RegionSchema = z.enum(["Florida", "US_East_Coast", "Caribbean", "Gulf_Coast", "Northeast", "Other"]);
export type Region = z.infer<typeof RegionSchema>;

/**
 * Airport reference record. Read-only to the engine.
 * timeZone is an IANA name; "daily travelers" is counted per local civil day. When absent it is
 * looked up in the reference set by code, else UTC days are used.
 */
export const AirportSchema = z.object({
  code: z.string().min(1),
  name: z.string().optional(),
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  baselineDailyTravelers: z.number().finite().min(0),
  timeZone: z.string().min(1).optional(),
  region: RegionSchema.optional(),
});
export type Airport = z.infer<typeof AirportSchema>;

export const DEFAULT_AIRPORT_TIME_ZONE = "UTC";

type RegionBox = { region: Exclude<Region, "Other">; latMin: number; latMax: number; lonMin: number; lonMax: number };

/** Checked in order; first match wins. */
const REGION_BOXES: RegionBox[] = [
  { region: "Florida", latMin: 25, latMax: 35, lonMin: -85, lonMax: -75 },
  { region: "US_East_Coast", latMin: 30, latMax: 45, lonMin: -85, lonMax: -65 },
  { region: "Caribbean", latMin: 10, latMax: 25, lonMin: -85, lonMax: -60 },
  { region: "Gulf_Coast", latMin: 25, latMax: 35, lonMin: -100, lonMax: -85 },
  { region: "Northeast", latMin: 30, latMax: 45, lonMin: -65, lonMax: -40 },
];

/** Coarse Atlantic-basin region for an airport coordinate. */
export function determineRegion(latitude: number, longitude: number): Region {
  for (const box of REGION_BOXES) {
    if (latitude >= box.latMin && latitude <= box.latMax && longitude >= box.lonMin && longitude <= box.lonMax) {
      return box.region;
    }
  }
  return "Other";
}

export function airportRegion(airport: Airport): Region {
  return airport.region ?? determineRegion(airport.latitude, airport.longitude);
}
