/**
 * Insurance exposure estimator: per-day records, additive totals and summary breakdowns.
 */

export { estimateExposure, combineTotals, totalsOf, totalPayout, compareRecords, EMPTY_TOTALS } from "./estimateExposure";
export { summarizeExposure } from "./summarize";
export type { SummarizeOptions } from "./summarize";
