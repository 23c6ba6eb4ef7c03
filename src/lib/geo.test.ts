import { describe, it } from "node:test";
import assert from "node:assert";
import { centroid, destinationPoint, haversineKm, meanSpreadKm, normalizeLongitude } from "./geo";

describe("haversineKm", () => {
  it("zero for identical points", () => {
    assert.strictEqual(haversineKm({ latitude: 25, longitude: -80 }, { latitude: 25, longitude: -80 }), 0);
  });

  it("one degree of latitude is ~111.2 km", () => {
    const d = haversineKm({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 });
    assert(Math.abs(d - 111.195) < 0.01, `got ${d}`);
  });

  it("one degree of longitude shrinks with latitude", () => {
    const equator = haversineKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 });
    const north = haversineKm({ latitude: 60, longitude: 0 }, { latitude: 60, longitude: 1 });
    assert(Math.abs(north - equator / 2) < 0.1, `equator ${equator}, 60N ${north}`);
  });

  it("is symmetric", () => {
    const a = { latitude: 32.364, longitude: -64.6787 };
    const b = { latitude: 25.7959, longitude: -80.287 };
    assert.strictEqual(haversineKm(a, b), haversineKm(b, a));
  });
});

describe("destinationPoint", () => {
  it("lands exactly radius km away on every bearing", () => {
    const origin = { latitude: 38.7, longitude: -27.1 };
    for (const bearing of [0, 45, 90, 180, 270, 333]) {
      const p = destinationPoint(origin, bearing, 250);
      assert(Math.abs(haversineKm(origin, p) - 250) < 1e-6, `bearing ${bearing}`);
    }
  });

  it("due north increases latitude only", () => {
    const p = destinationPoint({ latitude: 10, longitude: -60 }, 0, 111.195);
    assert(Math.abs(p.latitude - 11) < 1e-3);
    assert(Math.abs(p.longitude + 60) < 1e-9);
  });
});

describe("normalizeLongitude", () => {
  it("wraps into [-180, 180)", () => {
    assert.strictEqual(normalizeLongitude(280), -80);
    assert.strictEqual(normalizeLongitude(-190), 170);
    assert.strictEqual(normalizeLongitude(180), -180);
    assert.strictEqual(normalizeLongitude(0), 0);
  });
});

describe("centroid / meanSpreadKm", () => {
  it("centroid of one point is that point", () => {
    const c = centroid([{ latitude: 20, longitude: -70 }]);
    assert(c);
    assert(Math.abs(c.latitude - 20) < 1e-9);
    assert(Math.abs(c.longitude + 70) < 1e-9);
  });

  it("spread is zero for a single member and positive for two", () => {
    assert.strictEqual(meanSpreadKm([{ latitude: 20, longitude: -70 }]), 0);
    const spread = meanSpreadKm([
      { latitude: 20, longitude: -70 },
      { latitude: 22, longitude: -70 },
    ]);
    const half = haversineKm({ latitude: 20, longitude: -70 }, { latitude: 22, longitude: -70 }) / 2;
    assert(Math.abs(spread - half) < 1e-6, `got ${spread}, expected ${half}`);
  });

  it("centroid of nothing is null", () => {
    assert.strictEqual(centroid([]), null);
  });
});
