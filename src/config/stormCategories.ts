/**
 * Saffir–Simpson style classification by maximum sustained wind (kt).
 */

export type StormCategory =
  | "tropical_depression"
  | "tropical_storm"
  | "category_1"
  | "category_2"
  | "category_3"
  | "category_4"
  | "category_5";

/** Upper bounds (exclusive) per category; category_5 is open-ended. */
export const stormCategoryThresholds = {
  tropicalDepressionBelow: 34,
  tropicalStormBelow: 64,
  category1Below: 83,
  category2Below: 96,
  category3Below: 113,
  category4Below: 137,
} as const;

export function getStormCategory(windKt: number): StormCategory | "unknown" {
  const w = Number(windKt);
  if (!Number.isFinite(w) || w < 0) return "unknown";
  const t = stormCategoryThresholds;
  if (w < t.tropicalDepressionBelow) return "tropical_depression";
  if (w < t.tropicalStormBelow) return "tropical_storm";
  if (w < t.category1Below) return "category_1";
  if (w < t.category2Below) return "category_2";
  if (w < t.category3Below) return "category_3";
  if (w < t.category4Below) return "category_4";
  return "category_5";
}
