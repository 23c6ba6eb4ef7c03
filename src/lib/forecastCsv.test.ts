import { describe, it } from "node:test";
import assert from "node:assert";
import { parseForecastCsv } from "./forecastCsv";
import { buildTrajectories } from "@/engine/trackStore";

const HEADER = [
  "init_time",
  "track_id",
  "sample",
  "valid_time",
  "lat",
  "lon",
  "minimum_sea_level_pressure_hpa",
  "maximum_sustained_wind_speed_knots",
  "radius_34_knot_winds_ne_km",
  "radius_34_knot_winds_se_km",
  "radius_34_knot_winds_sw_km",
  "radius_34_knot_winds_nw_km",
  "radius_64_knot_winds_ne_km",
].join(",");

const CSV = [
  HEADER,
  "2024-09-26 00:00:00,AL09,0,2024-09-26 00:00:00,24.5,-84.1,975,80,220,180,150,,90",
  "2024-09-26 00:00:00,AL09,1,2024-09-26 06:00:00,25.1,275.5,,,,,,,",
  "2024-09-26 00:00:00,AL09,1,2024-09-26 12:00:00,,-84.9,,,,,,,",
  ",,,,,,,,,,,,",
  "2024-09-25 18:00:00,AL10,,2024-09-26 00:00:00,15.2,abc,,,,,,,",
].join("\n");

describe("parseForecastCsv", () => {
  const result = parseForecastCsv(CSV);

  it("maps columns and collapses quadrants to their maximum", () => {
    assert.deepStrictEqual(result.samples[0], {
      stormId: "AL09",
      memberId: "0",
      validTime: "2024-09-26 00:00:00",
      latitude: 24.5,
      longitude: -84.1,
      centralPressureHpa: 975,
      maxSustainedWindKt: 80,
      windRadius34Km: 220,
      windRadius50Km: undefined,
      windRadius64Km: 90,
    });
  });

  it("leaves unreported radii undefined", () => {
    const second = result.samples[1];
    assert(second);
    assert.strictEqual(second.memberId, "1");
    assert.strictEqual(second.windRadius34Km, undefined);
    assert.strictEqual(second.maxSustainedWindKt, undefined);
  });

  it("reports rows missing required values instead of throwing", () => {
    assert.strictEqual(result.samples.length, 2);
    assert.deepStrictEqual(result.rejectedRows, [
      { rowNumber: 4, reason: "missing lat" },
      { rowNumber: 6, reason: "lat/lon is not a number" },
    ]);
  });

  it("takes init times from accepted rows only", () => {
    assert.deepStrictEqual(result.initTimes, { AL09: "2024-09-26T00:00:00.000Z" });
    const earlier = parseForecastCsv(
      [HEADER, "2024-09-26 06:00:00,AL11,0,2024-09-26 06:00:00,20,-70", "2024-09-26 00:00:00,AL11,1,2024-09-26 06:00:00,20,-70"].join("\n")
    );
    assert.deepStrictEqual(earlier.initTimes, { AL11: "2024-09-26T00:00:00.000Z" });
  });

  it("feeds the track store directly", () => {
    const { trajectories, rejected } = buildTrajectories(result.samples);
    assert.strictEqual(rejected.length, 0);
    assert.deepStrictEqual(
      trajectories.map((t) => [t.memberId, t.samples[0]?.validTime, t.samples[0]?.longitude]),
      [
        ["0", "2024-09-26T00:00:00.000Z", -84.1],
        ["1", "2024-09-26T06:00:00.000Z", -84.5],
      ]
    );
  });
});
