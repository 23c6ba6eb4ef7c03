/**
 * Human-readable and spreadsheet renderings of a pipeline result.
 */

import * as XLSX from "xlsx";
import type { Airport, Region } from "@/domain/airport/airport.schema";
import { airportRegion } from "@/domain/airport/airport.schema";
import type { ExposurePipelineResult } from "@/engine/pipeline";

const TOP_AIRPORTS = 5;
const RULE = "=".repeat(50);
const SUBRULE = "-".repeat(30);

const usd = new Intl.NumberFormat("en-US", { style: "currency", currency: "USD" });
const count = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });
const pct = (share: number) => `${(share * 100).toFixed(1)}%`;

export type ReportOptions = {
  airports?: readonly Airport[];
  /** Printed as-is; omitted when absent so reports stay reproducible. */
  generatedAt?: string;
};

type ReportResult = Pick<ExposurePipelineResult, "summary" | "intervals" | "records">;

/** Plain-text executive summary, top airports and regional breakdown. */
export function formatExposureReport(result: ReportResult, options: ReportOptions = {}): string {
  const { summary } = result;
  const airportByCode = new Map((options.airports ?? []).map((a) => [a.code, a]));
  const storms = summary.byStorm.map((s) => s.key).sort();

  const lines: string[] = [];
  lines.push(RULE);
  lines.push("STORM EXPOSURE REPORT");
  lines.push(`Storms: ${storms.length > 0 ? storms.join(", ") : "none"}`);
  if (options.generatedAt) lines.push(`Generated: ${options.generatedAt}`);
  lines.push(RULE);

  lines.push("", "EXECUTIVE SUMMARY", SUBRULE);
  lines.push(`Travelers at Risk: ${count.format(summary.totals.travelersAtRisk)}`);
  lines.push(`Coverage Holders: ${count.format(summary.totals.coverageHolders)}`);
  lines.push(`Expected Claims: ${count.format(summary.totals.expectedClaims)}`);
  lines.push(`Expected Payout: ${usd.format(summary.totals.expectedPayoutUsd)}`);
  lines.push(`Administrative Costs: ${usd.format(summary.administrativeCostUsd)}`);
  lines.push(`Total Exposure: ${usd.format(summary.totalExposureUsd)}`);

  lines.push("", "CONCENTRATION", SUBRULE);
  lines.push(`HHI: ${count.format(summary.concentration.hhi)}`);
  lines.push(`Top-5 Airport Share: ${pct(summary.concentration.top5Share)}`);

  const { riskMetrics } = summary;
  lines.push("", "RISK METRICS", SUBRULE);
  lines.push(`Affected Airports: ${riskMetrics.affectedAirports}`);
  lines.push(`Exposure per Traveler: ${usd.format(riskMetrics.exposurePerTravelerUsd)}`);
  lines.push(`Exposure per Airport: ${usd.format(riskMetrics.exposurePerAirportUsd)}`);
  lines.push(`Severity Score: ${riskMetrics.severityScore.toFixed(1)}/100`);

  if (summary.byPeakWindThreshold.length > 0) {
    lines.push("", "EXPOSURE BY PEAK WIND", SUBRULE);
    for (const row of summary.byPeakWindThreshold) {
      lines.push(`${row.key}: ${usd.format(row.expectedPayoutUsd)} across ${row.airportCount} airport(s)`);
    }
  }

  lines.push("", `TOP ${TOP_AIRPORTS} AFFECTED AIRPORTS`, SUBRULE);
  const top = summary.byAirport.filter((row) => row.expectedPayoutUsd > 0).slice(0, TOP_AIRPORTS);
  if (top.length === 0) lines.push("No airport exceeds the disruption trigger.");
  top.forEach((row, i) => {
    const airport = airportByCode.get(row.key);
    const intervals = result.intervals.filter((iv) => iv.airportCode === row.key);
    const hours = intervals.reduce((s, iv) => s + iv.durationHours, 0);
    const peak = intervals.reduce((m, iv) => Math.max(m, iv.peakWindThresholdKt), 0);
    lines.push(`${i + 1}. ${airport?.name ?? row.key} (${row.key})`);
    lines.push(`   Payout: ${usd.format(row.expectedPayoutUsd)}`);
    lines.push(`   Expected Claims: ${count.format(row.expectedClaims)}`);
    lines.push(`   Disrupted Hours: ${hours.toFixed(1)}`);
    lines.push(`   Peak Wind Ring: ${peak} kt`);
  });

  lines.push("", "REGIONAL EXPOSURE BREAKDOWN", SUBRULE);
  const total = summary.totals.expectedPayoutUsd;
  for (const row of summary.byRegion) {
    const airportsInRegion = new Set(
      result.records
        .filter((r) => regionOf(r.airportCode, airportByCode) === row.key)
        .map((r) => r.airportCode)
    );
    lines.push(`${row.key}:`);
    lines.push(`  Payout: ${usd.format(row.expectedPayoutUsd)} (${pct(total > 0 ? row.expectedPayoutUsd / total : 0)})`);
    lines.push(`  Airports: ${airportsInRegion.size}`);
    lines.push(`  Claims: ${count.format(row.expectedClaims)}`);
  }

  return lines.join("\n");
}

function regionOf(code: string, airportByCode: ReadonlyMap<string, Airport>): Region {
  const airport = airportByCode.get(code);
  return airport ? airportRegion(airport) : "Other";
}

/** Workbook with one sheet per output table: Exposure, Intervals, Zones. */
export function buildExposureWorkbook(result: Pick<ExposurePipelineResult, "records" | "intervals" | "zones">): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  const exposure = XLSX.utils.json_to_sheet(
    result.records.map((r) => ({
      storm_id: r.stormId,
      airport_code: r.airportCode,
      date: r.date,
      travelers_at_risk: r.travelersAtRisk,
      coverage_holders: r.coverageHolders,
      expected_claims: r.expectedClaims,
      expected_payout_usd: r.expectedPayoutUsd,
    }))
  );
  XLSX.utils.book_append_sheet(workbook, exposure, "Exposure");

  const intervals = XLSX.utils.json_to_sheet(
    result.intervals.map((iv) => ({
      storm_id: iv.stormId,
      airport_code: iv.airportCode,
      start_time: iv.startTime,
      end_time: iv.endTime,
      duration_hours: iv.durationHours,
      peak_wind_kt: iv.peakWindThresholdKt,
      closest_approach_km: iv.closestApproachKm,
    }))
  );
  XLSX.utils.book_append_sheet(workbook, intervals, "Intervals");

  const zones = XLSX.utils.json_to_sheet(
    result.zones.map((z) => ({
      storm_id: z.stormId,
      valid_time: z.validTime,
      lead_time_hours: z.leadTimeHours,
      uncertainty_radius_km: z.uncertaintyRadiusKm,
      member_count: z.memberCount,
      circles_34kt: z.rings[34].circles.length,
      circles_50kt: z.rings[50].circles.length,
      circles_64kt: z.rings[64].circles.length,
    }))
  );
  XLSX.utils.book_append_sheet(workbook, zones, "Zones");

  return workbook;
}

export function exposureWorkbookToBuffer(workbook: XLSX.WorkBook): Buffer {
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return buffer;
}
