import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_EXPOSURE_CONFIG, resolveExposureConfig, validatePolicyParams } from "./exposureDefaults";
import { getStormCategory } from "./stormCategories";
import { ConfigurationError } from "@/domain/errors";

describe("resolveExposureConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    assert.deepStrictEqual(resolveExposureConfig(), DEFAULT_EXPOSURE_CONFIG);
    assert.deepStrictEqual(resolveExposureConfig({ claimRate: undefined }), DEFAULT_EXPOSURE_CONFIG);
  });

  it("merges overrides onto the defaults", () => {
    const config = resolveExposureConfig({ penetrationRate: 0.05, applySeasonality: true });
    assert.strictEqual(config.penetrationRate, 0.05);
    assert.strictEqual(config.applySeasonality, true);
    assert.strictEqual(config.claimRate, DEFAULT_EXPOSURE_CONFIG.claimRate);
  });

  it("collects every out-of-range parameter", () => {
    assert.throws(
      () => resolveExposureConfig({ penetrationRate: -0.1, administrativeCostRate: 1.2, minDisruptionHours: Number.POSITIVE_INFINITY }),
      (err: unknown) => {
        assert(err instanceof ConfigurationError);
        assert.deepStrictEqual(err.issues, [
          "minDisruptionHours must be finite",
          "penetrationRate must be >= 0",
          "administrativeCostRate must be <= 1",
        ]);
        return true;
      }
    );
  });

  it("accepts the closed bounds of rates", () => {
    assert.doesNotThrow(() => validatePolicyParams({ penetrationRate: 0, claimRate: 1, payoutPerClaimUsd: 0 }));
  });
});

describe("getStormCategory", () => {
  it("maps sustained wind to the Saffir–Simpson scale", () => {
    assert.strictEqual(getStormCategory(30), "tropical_depression");
    assert.strictEqual(getStormCategory(34), "tropical_storm");
    assert.strictEqual(getStormCategory(64), "category_1");
    assert.strictEqual(getStormCategory(100), "category_3");
    assert.strictEqual(getStormCategory(140), "category_5");
    assert.strictEqual(getStormCategory(Number.NaN), "unknown");
  });
});
