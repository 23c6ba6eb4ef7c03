/** Clamps value to [0, 1]; non-finite becomes 0. */
export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.max(0, Math.min(1, x));
}
