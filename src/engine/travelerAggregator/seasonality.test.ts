import { describe, it } from "node:test";
import assert from "node:assert";
import { holidayPeriodsOn } from "./holidays";
import { baselineTravelersFor, holidayFactor, seasonalityFactor } from "./seasonality";
import type { Airport } from "@/domain/airport/airport.schema";

const approx = (a: number, b: number, eps = 1e-9) => Math.abs(a - b) <= eps;

const MIA: Airport = { code: "MIA", latitude: 25.79, longitude: -80.29, baselineDailyTravelers: 50_000 };

describe("holidayPeriodsOn", () => {
  it("Thanksgiving week runs from the fourth Thursday for seven days", () => {
    assert.deepStrictEqual(holidayPeriodsOn("2024-11-27"), []);
    assert.deepStrictEqual(holidayPeriodsOn("2024-11-28"), ["thanksgivingWeek"]);
    assert.deepStrictEqual(holidayPeriodsOn("2025-12-03"), ["thanksgivingWeek"]);
    assert.deepStrictEqual(holidayPeriodsOn("2025-12-04"), []);
  });

  it("Memorial Day is the last Monday of May, two days either side", () => {
    assert.deepStrictEqual(holidayPeriodsOn("2024-05-25"), ["memorialDay"]);
    assert.deepStrictEqual(holidayPeriodsOn("2024-05-29"), ["memorialDay"]);
    assert.deepStrictEqual(holidayPeriodsOn("2024-05-30"), []);
  });

  it("Labor Day weekend can start in August", () => {
    assert.deepStrictEqual(holidayPeriodsOn("2025-08-30"), ["laborDay"]);
    assert.deepStrictEqual(holidayPeriodsOn("2024-09-26"), []);
  });

  it("reports every period a date falls in", () => {
    assert.deepStrictEqual(holidayPeriodsOn("2024-12-31"), ["christmasWeek", "newYear"]);
    assert.deepStrictEqual(holidayPeriodsOn("2024-07-04"), ["summerVacation", "independenceDay"]);
    assert.deepStrictEqual(holidayPeriodsOn("2025-01-05"), ["newYear"]);
    assert.deepStrictEqual(holidayPeriodsOn("2025-04-15"), ["springBreak"]);
  });
});

describe("holidayFactor", () => {
  it("takes the largest multiplier of overlapping periods", () => {
    assert.strictEqual(holidayFactor("2024-12-31"), 2);
    assert.strictEqual(holidayFactor("2024-07-04"), 1.2);
    assert.strictEqual(holidayFactor("2024-10-15"), 1);
  });
});

describe("seasonalityFactor", () => {
  it("multiplies month, holiday and day of week", () => {
    // Friday after Thanksgiving: Florida November 1.0 × Thanksgiving week 1.8 × Friday 1.2
    assert(approx(seasonalityFactor(MIA, "2024-11-29"), 2.16));
    assert(approx(baselineTravelersFor(MIA, "2024-11-29", true), 108_000, 1e-6));
    assert.strictEqual(baselineTravelersFor(MIA, "2024-11-29", false), 50_000);
  });
});
