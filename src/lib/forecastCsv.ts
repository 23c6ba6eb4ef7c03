/**
 * Parse ensemble forecast CSV (one row per track point per ensemble sample) into raw track rows.
 * Quadrant wind radii are collapsed to their maximum, giving a circle that contains every quadrant.
 */

import * as XLSX from "xlsx";
import type { InitTimes, RawTrackSample, WindThreshold } from "@/domain/storm/storm.schema";
import { WIND_THRESHOLDS } from "@/domain/storm/storm.schema";
import { parseUtcTimestamp, toIsoUtc } from "./time";

const REQUIRED_COLUMNS = ["track_id", "valid_time", "lat", "lon"] as const;
const QUADRANTS = ["ne", "se", "sw", "nw"] as const;
const DEFAULT_MEMBER_ID = "0";

export type RejectedCsvRow = {
  /** 1-based line number; the header is line 1. */
  rowNumber: number;
  reason: string;
};

export type ParseForecastCsvResult = {
  samples: RawTrackSample[];
  /** Earliest init_time seen per track_id. */
  initTimes: InitTimes;
  rejectedRows: RejectedCsvRow[];
};

function isRowEmpty(cells: unknown[]): boolean {
  return cells.every((c) => c === undefined || c === null || String(c).trim() === "");
}

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** Largest reported quadrant radius for a threshold, or undefined when no quadrant is reported. */
function maxQuadrantRadius(cell: (column: string) => string | undefined, threshold: WindThreshold): number | undefined {
  const values = QUADRANTS.map((q) => optionalNumber(cell(`radius_${threshold}_knot_winds_${q}_km`))).filter(
    (v): v is number => v !== undefined
  );
  return values.length > 0 ? Math.max(...values) : undefined;
}

export function parseForecastCsv(text: string): ParseForecastCsvResult {
  const workbook = XLSX.read(text, { type: "string", raw: true });
  const firstSheetName = workbook.SheetNames[0];
  const sheet = firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
  if (!sheet) return { samples: [], initTimes: {}, rejectedRows: [] };

  const raw: unknown[][] = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: "", raw: true });
  const headers = (raw[0] ?? []).map((h) => String(h ?? "").trim().toLowerCase());
  const columnIndex = new Map(headers.map((h, j) => [h, j]));

  const samples: RawTrackSample[] = [];
  const rejectedRows: RejectedCsvRow[] = [];
  const initMs = new Map<string, number>();

  for (let i = 1; i < raw.length; i++) {
    const cells = raw[i] ?? [];
    if (isRowEmpty(cells)) continue;
    const rowNumber = i + 1;
    const cell = (column: string): string | undefined => {
      const j = columnIndex.get(column);
      return j === undefined ? undefined : String(cells[j] ?? "").trim();
    };

    const missing = REQUIRED_COLUMNS.filter((c) => !cell(c));
    if (missing.length > 0) {
      rejectedRows.push({ rowNumber, reason: `missing ${missing.join(", ")}` });
      continue;
    }
    const latitude = optionalNumber(cell("lat"));
    const longitude = optionalNumber(cell("lon"));
    if (latitude === undefined || longitude === undefined) {
      rejectedRows.push({ rowNumber, reason: "lat/lon is not a number" });
      continue;
    }

    const stormId = cell("track_id") ?? "";
    const init = cell("init_time");
    const initParsed = init ? parseUtcTimestamp(init) : null;
    if (initParsed !== null) {
      const prev = initMs.get(stormId);
      if (prev === undefined || initParsed < prev) initMs.set(stormId, initParsed);
    }

    const [r34, r50, r64] = WIND_THRESHOLDS.map((t) => maxQuadrantRadius(cell, t));
    samples.push({
      stormId,
      memberId: cell("sample") || DEFAULT_MEMBER_ID,
      validTime: cell("valid_time") ?? "",
      latitude,
      longitude,
      centralPressureHpa: optionalNumber(cell("minimum_sea_level_pressure_hpa")),
      maxSustainedWindKt: optionalNumber(cell("maximum_sustained_wind_speed_knots")),
      windRadius34Km: r34,
      windRadius50Km: r50,
      windRadius64Km: r64,
    });
  }

  const initTimes = Object.fromEntries([...initMs].map(([id, ms]) => [id, toIsoUtc(ms)]));
  return { samples, initTimes, rejectedRows };
}
