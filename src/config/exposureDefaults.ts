/**
 * Exposure engine configuration: defaults, schema and resolution.
 * Business parameters are always passed explicitly into the stages; nothing reads these defaults implicitly.
 */

import { z } from "zod";
import { ConfigurationError } from "@/domain/errors";

const finiteNonNegative = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite(`${label} must be finite`).min(0, `${label} must be >= 0`);

const rate01 = (label: string) =>
  finiteNonNegative(label).max(1, `${label} must be <= 1`);

export const ExposureConfigSchema = z.object({
  /** Positional uncertainty at lead time 0 (km). */
  uncertaintyBaseKm: finiteNonNegative("uncertaintyBaseKm"),
  /** Linear growth of positional uncertainty per forecast hour (km/h). */
  uncertaintyGrowthKmPerHour: finiteNonNegative("uncertaintyGrowthKmPerHour"),
  /** Extra uncertainty per km of mean ensemble spread. 0 = lead time only. */
  spreadUncertaintyFactor: finiteNonNegative("spreadUncertaintyFactor"),
  /** Intervals shorter than this do not trigger the covered delay. */
  minDisruptionHours: finiteNonNegative("minDisruptionHours"),
  penetrationRate: rate01("penetrationRate"),
  claimRate: rate01("claimRate"),
  payoutPerClaimUsd: finiteNonNegative("payoutPerClaimUsd"),
  /** Loading on payouts for claims handling; reported in the summary only. */
  administrativeCostRate: rate01("administrativeCostRate"),
  /** Scale baseline travelers by regional month and day-of-week factors. */
  applySeasonality: z.boolean(),
});
export type ExposureConfig = z.infer<typeof ExposureConfigSchema>;

/** Policy parameters consumed by the estimator. */
export type PolicyParams = Pick<ExposureConfig, "penetrationRate" | "claimRate" | "payoutPerClaimUsd">;

export const DEFAULT_POLICY_PARAMS: PolicyParams = {
  penetrationRate: 0.02,
  claimRate: 0.6,
  payoutPerClaimUsd: 500,
};

export const DEFAULT_EXPOSURE_CONFIG: ExposureConfig = {
  uncertaintyBaseKm: 0,
  uncertaintyGrowthKmPerHour: 2.5,
  spreadUncertaintyFactor: 0,
  minDisruptionHours: 3,
  ...DEFAULT_POLICY_PARAMS,
  administrativeCostRate: 0.15,
  applySeasonality: false,
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path && !issue.message.startsWith(path) ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Merges overrides onto the defaults and validates every field.
 * Throws ConfigurationError listing all out-of-range parameters.
 */
export function resolveExposureConfig(overrides?: Partial<ExposureConfig>): ExposureConfig {
  const defined = Object.fromEntries(Object.entries(overrides ?? {}).filter(([, v]) => v !== undefined));
  const parsed = ExposureConfigSchema.safeParse({ ...DEFAULT_EXPOSURE_CONFIG, ...defined });
  if (!parsed.success) throw new ConfigurationError(formatIssues(parsed.error));
  return parsed.data;
}

/** Validates policy parameters on their own (estimator entry point). */
export function validatePolicyParams(params: PolicyParams): PolicyParams {
  const parsed = ExposureConfigSchema.pick({
    penetrationRate: true,
    claimRate: true,
    payoutPerClaimUsd: true,
  }).safeParse(params);
  if (!parsed.success) throw new ConfigurationError(formatIssues(parsed.error));
  return parsed.data;
}
