import { describe, it } from "node:test";
import assert from "node:assert";
import { aggregateTravelers, intervalDayShares } from "./aggregateTravelers";
import { localDayBounds } from "./localDay";
import { seasonalityFactor } from "./seasonality";
import { resolveAirportTimeZone } from "./airportTimeZone";
import type { Airport } from "@/domain/airport/airport.schema";
import type { DisruptionInterval } from "@/domain/exposure/exposure.types";
import { sumApproxOne } from "@/dev/invariants";

const MIA: Airport = {
  code: "MIA",
  latitude: 25.79,
  longitude: -80.29,
  baselineDailyTravelers: 50_000,
  timeZone: "America/New_York",
};

const PARAMS = { minDisruptionHours: 3, applySeasonality: false };

function interval(startTime: string, endTime: string, partial: Partial<DisruptionInterval> = {}): DisruptionInterval {
  return {
    airportCode: "MIA",
    stormId: "AL09",
    startTime,
    endTime,
    durationHours: (Date.parse(endTime) - Date.parse(startTime)) / 3_600_000,
    peakWindThresholdKt: 34,
    closestApproachKm: 90,
    ...partial,
  };
}

describe("localDayBounds", () => {
  it("uses local midnights", () => {
    const day = localDayBounds("2024-09-26", "America/New_York");
    assert.strictEqual(new Date(day.startMs).toISOString(), "2024-09-26T04:00:00.000Z");
    assert.strictEqual(new Date(day.endMs).toISOString(), "2024-09-27T04:00:00.000Z");
  });

  it("the fall-back day is 25 hours long", () => {
    const day = localDayBounds("2024-11-03", "America/New_York");
    assert.strictEqual(day.endMs - day.startMs, 25 * 3_600_000);
  });
});

describe("intervalDayShares", () => {
  it("a local-midnight-aligned 24 h interval covers exactly one day", () => {
    const shares = intervalDayShares(interval("2024-09-26T04:00:00Z", "2024-09-27T04:00:00Z"), "America/New_York");
    assert.deepStrictEqual(shares, [{ date: "2024-09-26", overlapFraction: 1 }]);
  });

  it("a 24 h interval starting at local noon splits in half and sums to 1", () => {
    const shares = intervalDayShares(interval("2024-09-26T16:00:00Z", "2024-09-27T16:00:00Z"), "America/New_York");
    assert.deepStrictEqual(shares, [
      { date: "2024-09-26", overlapFraction: 0.5 },
      { date: "2024-09-27", overlapFraction: 0.5 },
    ]);
    assert(sumApproxOne(shares.map((s) => s.overlapFraction)));
  });

  it("24 h over a 25 h local day covers 24/25 of it", () => {
    const shares = intervalDayShares(interval("2024-11-03T04:00:00Z", "2024-11-04T04:00:00Z"), "America/New_York");
    assert.strictEqual(shares.length, 1);
    assert(Math.abs((shares[0]?.overlapFraction ?? 0) - 0.96) < 1e-12);
  });

  it("a zero-length interval still yields its local day", () => {
    const shares = intervalDayShares(interval("2024-09-26T10:00:00Z", "2024-09-26T10:00:00Z"), "UTC");
    assert.deepStrictEqual(shares, [{ date: "2024-09-26", overlapFraction: 0 }]);
  });
});

describe("aggregateTravelers", () => {
  it("full local day → baseline travelers", () => {
    const { travelerDays } = aggregateTravelers(
      [interval("2024-09-26T04:00:00Z", "2024-09-27T04:00:00Z")],
      [MIA],
      PARAMS
    );
    assert.deepStrictEqual(travelerDays, [
      {
        airportCode: "MIA",
        stormId: "AL09",
        date: "2024-09-26",
        overlapFraction: 1,
        baselineTravelers: 50_000,
        travelersAtRisk: 50_000,
        belowTrigger: false,
      },
    ]);
  });

  it("an interval below the trigger contributes zero travelers", () => {
    const { travelerDays } = aggregateTravelers(
      [interval("2024-09-26T12:00:00Z", "2024-09-26T14:00:00Z")],
      [MIA],
      PARAMS
    );
    assert.strictEqual(travelerDays.length, 1);
    assert.strictEqual(travelerDays[0]?.travelersAtRisk, 0);
    assert.strictEqual(travelerDays[0]?.belowTrigger, true);
  });

  it("an interval exactly at the trigger counts", () => {
    const { travelerDays } = aggregateTravelers(
      [interval("2024-09-26T12:00:00Z", "2024-09-26T15:00:00Z")],
      [MIA],
      PARAMS
    );
    assert.strictEqual(travelerDays[0]?.travelersAtRisk, 6_250);
  });

  it("sums two intervals of the same storm on the same local day", () => {
    const { travelerDays } = aggregateTravelers(
      [
        interval("2024-09-26T04:00:00Z", "2024-09-26T10:00:00Z"),
        interval("2024-09-26T16:00:00Z", "2024-09-26T22:00:00Z"),
      ],
      [MIA],
      PARAMS
    );
    assert.strictEqual(travelerDays.length, 1);
    assert.strictEqual(travelerDays[0]?.overlapFraction, 0.5);
    assert.strictEqual(travelerDays[0]?.travelersAtRisk, 25_000);
  });

  it("scales by seasonality when enabled", () => {
    // 2024-09-26 is a Thursday; Florida September factor 0.8
    assert(Math.abs(seasonalityFactor(MIA, "2024-09-26") - 0.8) < 1e-12);
    const { travelerDays } = aggregateTravelers(
      [interval("2024-09-26T04:00:00Z", "2024-09-27T04:00:00Z")],
      [MIA],
      { ...PARAMS, applySeasonality: true }
    );
    assert(Math.abs((travelerDays[0]?.travelersAtRisk ?? 0) - 40_000) < 1e-6);
  });

  it("warns and skips intervals for unknown airports", () => {
    const { travelerDays, warnings } = aggregateTravelers(
      [interval("2024-09-26T04:00:00Z", "2024-09-27T04:00:00Z", { airportCode: "XXX" })],
      [MIA],
      PARAMS
    );
    assert.strictEqual(travelerDays.length, 0);
    assert.deepStrictEqual(warnings, ["[XXX] no airport reference for interval of AL09, skipped"]);
  });

  it("falls back to UTC days for an unknown time zone", () => {
    const { travelerDays, warnings } = aggregateTravelers(
      [interval("2024-09-26T00:00:00Z", "2024-09-27T00:00:00Z")],
      [{ ...MIA, timeZone: "Mars/Olympus" }],
      PARAMS
    );
    assert.deepStrictEqual(warnings, ['[MIA] unknown time zone "Mars/Olympus", using UTC days']);
    assert.deepStrictEqual(
      travelerDays.map((d) => [d.date, d.overlapFraction]),
      [["2024-09-26", 1]]
    );
  });

  it("takes a missing time zone from the reference airport with the same code", () => {
    const { travelerDays, warnings } = aggregateTravelers(
      [interval("2024-09-26T04:00:00Z", "2024-09-27T04:00:00Z")],
      [{ ...MIA, timeZone: undefined }],
      PARAMS
    );
    assert.deepStrictEqual(warnings, []);
    assert.deepStrictEqual(
      travelerDays.map((d) => [d.date, d.overlapFraction, d.travelersAtRisk]),
      [["2024-09-26", 1, 50_000]]
    );
  });

  it("warns once when an airport has no time zone anywhere", () => {
    const { travelerDays, warnings } = aggregateTravelers(
      [
        interval("2024-09-26T00:00:00Z", "2024-09-26T12:00:00Z", { airportCode: "ZZZ" }),
        interval("2024-09-26T18:00:00Z", "2024-09-27T00:00:00Z", { airportCode: "ZZZ" }),
      ],
      [{ ...MIA, code: "ZZZ", timeZone: undefined }],
      PARAMS
    );
    assert.deepStrictEqual(warnings, ["[ZZZ] no time zone and no reference airport, using UTC days"]);
    assert.deepStrictEqual(
      travelerDays.map((d) => [d.date, d.overlapFraction]),
      [["2024-09-26", 0.75]]
    );
  });
});

describe("resolveAirportTimeZone", () => {
  it("prefers the airport's own zone", () => {
    assert.deepStrictEqual(resolveAirportTimeZone({ ...MIA, timeZone: "America/Chicago" }), {
      timeZone: "America/Chicago",
    });
  });

  it("looks up the reference set case-insensitively by code", () => {
    assert.deepStrictEqual(resolveAirportTimeZone({ ...MIA, code: "sju", timeZone: undefined }), {
      timeZone: "America/Puerto_Rico",
    });
  });
});
