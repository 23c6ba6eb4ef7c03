/**
 * Insurance Exposure Estimator (pure, deterministic).
 * Applies policy parameters to travelers at risk; parameters are always passed in explicitly.
 */

import type { ExposureRecord, ExposureTotals, TravelerDay } from "@/domain/exposure/exposure.types";
import type { PolicyParams } from "@/config/exposureDefaults";
import { validatePolicyParams } from "@/config/exposureDefaults";

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export function compareRecords(
  a: Pick<ExposureRecord, "stormId" | "airportCode" | "date">,
  b: Pick<ExposureRecord, "stormId" | "airportCode" | "date">
): number {
  return compareStrings(a.stormId, b.stormId) || compareStrings(a.airportCode, b.airportCode) || compareStrings(a.date, b.date);
}

/**
 * One ExposureRecord per traveler day.
 * Throws ConfigurationError for out-of-range parameters.
 */
export function estimateExposure(travelerDays: readonly TravelerDay[], params: PolicyParams): ExposureRecord[] {
  const { penetrationRate, claimRate, payoutPerClaimUsd } = validatePolicyParams(params);

  return travelerDays
    .map((day) => {
      const travelersAtRisk = day.travelersAtRisk;
      const coverageHolders = travelersAtRisk * penetrationRate;
      const expectedClaims = coverageHolders * claimRate;
      return {
        airportCode: day.airportCode,
        stormId: day.stormId,
        date: day.date,
        travelersAtRisk,
        coverageHolders,
        expectedClaims,
        expectedPayoutUsd: expectedClaims * payoutPerClaimUsd,
      };
    })
    .sort(compareRecords);
}

export const EMPTY_TOTALS: Readonly<ExposureTotals> = {
  travelersAtRisk: 0,
  coverageHolders: 0,
  expectedClaims: 0,
  expectedPayoutUsd: 0,
};

export function combineTotals(a: ExposureTotals, b: ExposureTotals): ExposureTotals {
  return {
    travelersAtRisk: a.travelersAtRisk + b.travelersAtRisk,
    coverageHolders: a.coverageHolders + b.coverageHolders,
    expectedClaims: a.expectedClaims + b.expectedClaims,
    expectedPayoutUsd: a.expectedPayoutUsd + b.expectedPayoutUsd,
  };
}

export function totalsOf(records: readonly ExposureTotals[]): ExposureTotals {
  return records.reduce<ExposureTotals>(
    (acc, r) =>
      combineTotals(acc, {
        travelersAtRisk: r.travelersAtRisk,
        coverageHolders: r.coverageHolders,
        expectedClaims: r.expectedClaims,
        expectedPayoutUsd: r.expectedPayoutUsd,
      }),
    { ...EMPTY_TOTALS }
  );
}

export function totalPayout(records: readonly ExposureRecord[]): number {
  return totalsOf(records).expectedPayoutUsd;
}
