import { describe, it } from "node:test";
import assert from "node:assert";
import { findReferenceAirport, loadReferenceAirports } from "./airports";
import { airportRegion, determineRegion } from "@/domain/airport/airport.schema";
import { isValidTimeZone } from "@/engine/travelerAggregator";

describe("loadReferenceAirports", () => {
  it("loads the Atlantic set with unique codes and valid time zones", () => {
    const airports = loadReferenceAirports();
    assert.strictEqual(airports.length, 32);
    assert.strictEqual(new Set(airports.map((a) => a.code)).size, 32);
    for (const a of airports) assert(isValidTimeZone(a.timeZone ?? "UTC"), a.code);
  });

  it("finds an airport by code, case-insensitively", () => {
    assert.strictEqual(findReferenceAirport("mia")?.baselineDailyTravelers, 50_000);
    assert.strictEqual(findReferenceAirport("XXX"), undefined);
  });
});

describe("determineRegion", () => {
  it("classifies by the first matching box", () => {
    const region = (code: string) => {
      const a = findReferenceAirport(code);
      assert(a);
      return airportRegion(a);
    };
    assert.strictEqual(region("MIA"), "Florida");
    assert.strictEqual(region("JFK"), "US_East_Coast");
    assert.strictEqual(region("SJU"), "Caribbean");
    assert.strictEqual(region("BDA"), "Northeast");
    assert.strictEqual(region("PTY"), "Other");
    assert.strictEqual(determineRegion(29.9, -95.3), "Gulf_Coast");
  });

  it("an explicit region wins over geography", () => {
    assert.strictEqual(
      airportRegion({ code: "X", latitude: 25.8, longitude: -80.3, baselineDailyTravelers: 1, region: "Other" }),
      "Other"
    );
  });
});
