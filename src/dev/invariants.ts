/**
 * Dev-only shared invariant helpers for Engine Health.
 * Deterministic predicates and tolerances; no side effects.
 */

export const SUM_TOLERANCE = 1e-9;

export function sumApproxOne(arr: number[], tolerance = SUM_TOLERANCE): boolean {
  const sum = arr.reduce((a, b) => a + b, 0);
  return Math.abs(sum - 1) <= tolerance;
}

export function allNonNegative(arr: number[]): boolean {
  return arr.every((v) => Number.isFinite(v) && v >= 0);
}

export function inClosed01(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 1;
}

export function isNonDecreasing(arr: number[]): boolean {
  return arr.every((v, i) => i === 0 || v >= (arr[i - 1] ?? v));
}

/** Relative comparison; exact zero matches only zero. */
export function approxEqual(a: number, b: number, relTolerance = SUM_TOLERANCE): boolean {
  if (a === b) return true;
  return Math.abs(a - b) <= relTolerance * Math.max(Math.abs(a), Math.abs(b));
}
