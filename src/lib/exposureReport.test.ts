import { describe, it } from "node:test";
import assert from "node:assert";
import * as XLSX from "xlsx";
import { buildExposureWorkbook, exposureWorkbookToBuffer, formatExposureReport } from "./exposureReport";
import { runExposurePipeline } from "@/engine/pipeline";
import { FIXTURE_INIT_TIME, fixtureAirports, miamiFullDaySamples, miamiShortPassSamples } from "@/dev/fixtures";

const airports = fixtureAirports.filter((a) => a.code === "MIA");
const fullDay = runExposurePipeline({ samples: miamiFullDaySamples, initTimes: { AL09: FIXTURE_INIT_TIME }, airports });

describe("formatExposureReport", () => {
  it("renders the executive summary, top airports and regions", () => {
    const rule = "=".repeat(50);
    const sub = "-".repeat(30);
    assert.strictEqual(
      formatExposureReport(fullDay, { airports }),
      [
        rule,
        "STORM EXPOSURE REPORT",
        "Storms: AL09",
        rule,
        "",
        "EXECUTIVE SUMMARY",
        sub,
        "Travelers at Risk: 50,000",
        "Coverage Holders: 1,000",
        "Expected Claims: 600",
        "Expected Payout: $300,000.00",
        "Administrative Costs: $45,000.00",
        "Total Exposure: $345,000.00",
        "",
        "CONCENTRATION",
        sub,
        "HHI: 10,000",
        "Top-5 Airport Share: 100.0%",
        "",
        "RISK METRICS",
        sub,
        "Affected Airports: 1",
        "Exposure per Traveler: $6.90",
        "Exposure per Airport: $345,000.00",
        "Severity Score: 0.4/100",
        "",
        "EXPOSURE BY PEAK WIND",
        sub,
        "34kt: $300,000.00 across 1 airport(s)",
        "",
        "TOP 5 AFFECTED AIRPORTS",
        sub,
        "1. Miami International (MIA)",
        "   Payout: $300,000.00",
        "   Expected Claims: 600",
        "   Disrupted Hours: 24.0",
        "   Peak Wind Ring: 34 kt",
        "",
        "REGIONAL EXPOSURE BREAKDOWN",
        sub,
        "Florida:",
        "  Payout: $300,000.00 (100.0%)",
        "  Airports: 1",
        "  Claims: 600",
      ].join("\n")
    );
  });

  it("says so when nothing crosses the trigger", () => {
    const short = runExposurePipeline({ samples: miamiShortPassSamples, initTimes: { AL09: FIXTURE_INIT_TIME }, airports });
    const report = formatExposureReport(short, { airports, generatedAt: "2024-09-26T12:00:00Z" });
    assert(report.split("\n").includes("Generated: 2024-09-26T12:00:00Z"));
    assert(report.split("\n").includes("No airport exceeds the disruption trigger."));
  });
});

describe("buildExposureWorkbook", () => {
  it("writes Exposure, Intervals and Zones sheets that read back", () => {
    const buffer = exposureWorkbookToBuffer(buildExposureWorkbook(fullDay));
    const workbook = XLSX.read(buffer, { type: "buffer" });
    assert.deepStrictEqual(workbook.SheetNames, ["Exposure", "Intervals", "Zones"]);

    const sheet = (name: string) => {
      const s = workbook.Sheets[name];
      assert(s, name);
      return XLSX.utils.sheet_to_json<Record<string, unknown>>(s);
    };
    const exposure = sheet("Exposure");
    assert.strictEqual(exposure.length, 1);
    assert.strictEqual(exposure[0]?.airport_code, "MIA");
    assert.strictEqual(exposure[0]?.date, "2024-09-26");
    assert.strictEqual(sheet("Intervals")[0]?.duration_hours, 24);
    assert.strictEqual(sheet("Zones").length, 5);
  });
});
