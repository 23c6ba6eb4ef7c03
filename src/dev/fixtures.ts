/**
 * Dev-only fixtures for Engine Health checks and pipeline tests.
 * Deterministic tracks and airports, same every run.
 */

import type { Airport } from "@/domain/airport/airport.schema";
import type { RawTrackSample } from "@/domain/storm/storm.schema";

export const FIXTURE_INIT_TIME = "2024-09-26T04:00:00Z";

export const fixtureAirports: Airport[] = [
  { code: "MIA", name: "Miami International", latitude: 25.79, longitude: -80.29, baselineDailyTravelers: 50_000, timeZone: "America/New_York" },
  { code: "TPA", name: "Tampa International", latitude: 27.98, longitude: -82.53, baselineDailyTravelers: 30_000, timeZone: "America/New_York" },
  { code: "JFK", name: "John F. Kennedy International", latitude: 40.64, longitude: -73.78, baselineDailyTravelers: 80_000, timeZone: "America/New_York" },
  { code: "SJU", name: "San Juan Luis Munoz Marin", latitude: 18.44, longitude: -66.0, baselineDailyTravelers: 12_000, timeZone: "America/Puerto_Rico" },
];

function at(hoursAfterInit: number): string {
  return new Date(Date.parse(FIXTURE_INIT_TIME) + hoursAfterInit * 3_600_000).toISOString();
}

/**
 * Single-member storm parked south of Miami for 24 h, then gone.
 * With default config MIA is disrupted for exactly its local day of 2024-09-26.
 */
export const miamiFullDaySamples: RawTrackSample[] = [
  ...[0, 6, 12, 18].map((h) => ({
    stormId: "AL09",
    memberId: "0",
    validTime: at(h),
    latitude: 25,
    longitude: -80,
    maxSustainedWindKt: 85,
    centralPressureHpa: 968,
    windRadius34Km: 200,
  })),
  { stormId: "AL09", memberId: "0", validTime: at(24), latitude: 35, longitude: -70, maxSustainedWindKt: 60, windRadius34Km: 200 },
];

/** Same storm, but it clears Miami after 2 h (below the 3 h trigger). */
export const miamiShortPassSamples: RawTrackSample[] = [
  { stormId: "AL09", memberId: "0", validTime: at(0), latitude: 25, longitude: -80, windRadius34Km: 200 },
  { stormId: "AL09", memberId: "0", validTime: at(2), latitude: 35, longitude: -70, windRadius34Km: 200 },
];

const ENSEMBLE_OFFSETS = [
  { memberId: "0", dLat: 0, dLon: 0 },
  { memberId: "1", dLat: 0.4, dLon: -0.3 },
  { memberId: "2", dLat: -0.3, dLon: 0.5 },
];

/**
 * Three-member ensemble tracking north-west across the Florida Straits, 6-hourly for 48 h.
 * Member 2 reports no 64 kt radius; member 1 stops reporting after 36 h.
 */
export const ensembleSamples: RawTrackSample[] = ENSEMBLE_OFFSETS.flatMap(({ memberId, dLat, dLon }) =>
  [0, 6, 12, 18, 24, 30, 36, 42, 48]
    .filter((h) => !(memberId === "1" && h > 36))
    .map((h) => ({
      stormId: "AL14",
      memberId,
      validTime: at(h),
      latitude: 21 + h * 0.15 + dLat,
      longitude: -76 - h * 0.12 + dLon,
      maxSustainedWindKt: 70 + h,
      centralPressureHpa: 985 - h * 0.5,
      windRadius34Km: 180 + h,
      windRadius50Km: 90,
      windRadius64Km: memberId === "2" ? undefined : 40,
    }))
);

/** Rows every stage must survive: bad coordinates, duplicate key, 0–360 longitude, negative radius. */
export const edgeSamples: unknown[] = [
  { stormId: "AL20", memberId: "0", validTime: at(0), latitude: 22, longitude: 280, windRadius34Km: 150 },
  { stormId: "AL20", memberId: "0", validTime: at(0), latitude: 22, longitude: -80, windRadius34Km: 150 },
  { stormId: "AL20", memberId: "0", validTime: at(6), latitude: 95, longitude: -80, windRadius34Km: 150 },
  { stormId: "AL20", memberId: "0", validTime: "not a time", latitude: 22, longitude: -80 },
  { stormId: "AL20", memberId: "0", validTime: at(12), latitude: 23, longitude: -80.5, windRadius34Km: -5 },
  { stormId: "AL20", memberId: "0", validTime: at(18), latitude: 24, longitude: -81, windRadius34Km: 0 },
];
