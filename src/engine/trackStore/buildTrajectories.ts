/**
 * Track Store: validates raw samples and groups them into per-member trajectories (pure, deterministic).
 * Bad rows are rejected individually; a storm aborts only when none of its rows survive.
 */

import { RawTrackSampleSchema } from "@/domain/storm/storm.schema";
import type { TrackSample, Trajectory } from "@/domain/storm/storm.schema";
import { EmptyTrajectoryError, MalformedSampleError } from "@/domain/errors";
import { normalizeLongitude } from "@/lib/geo";
import { parseUtcTimestamp, toIsoUtc } from "@/lib/time";
import { dlog, dwarn } from "@/lib/debug";

export type TrackStoreResult = {
  trajectories: Trajectory[];
  rejected: MalformedSampleError[];
  stormIds: string[];
};

const RADIUS_FIELDS = ["windRadius34Km", "windRadius50Km", "windRadius64Km"] as const;

function optionalNumber(v: number | null | undefined): number | undefined {
  return v === null || v === undefined ? undefined : v;
}

function rawStormId(row: unknown): string | undefined {
  if (typeof row === "object" && row !== null && "stormId" in row && typeof row.stormId === "string" && row.stormId) {
    return row.stormId;
  }
  return undefined;
}

/**
 * Validates one raw row. Throws MalformedSampleError on:
 * non-finite / out-of-range coordinates, unparseable validTime, negative or non-finite radius, bad intensity.
 * Longitudes in (180, 360] are wrapped to the western hemisphere.
 */
export function validateTrackSample(row: unknown, rowIndex: number): TrackSample {
  const stormId = rawStormId(row);
  const parsed = RawTrackSampleSchema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const reason = issue ? `${issue.path.join(".") || "row"}: ${issue.message}` : "invalid row";
    throw new MalformedSampleError({ rowIndex, stormId, reason });
  }
  const r = parsed.data;
  const fail = (reason: string) => new MalformedSampleError({ rowIndex, stormId: r.stormId, reason });

  if (!Number.isFinite(r.latitude) || r.latitude < -90 || r.latitude > 90) {
    throw fail(`latitude must be finite and within [-90, 90], got ${r.latitude}`);
  }
  if (!Number.isFinite(r.longitude) || r.longitude < -180 || r.longitude > 360) {
    throw fail(`longitude must be finite and within [-180, 360], got ${r.longitude}`);
  }
  const validMs = parseUtcTimestamp(r.validTime);
  if (validMs === null) throw fail(`validTime is not a timestamp: "${r.validTime}"`);

  for (const field of RADIUS_FIELDS) {
    const v = r[field];
    if (v === null || v === undefined) continue;
    if (!Number.isFinite(v) || v < 0) throw fail(`${field} must be a non-negative number, got ${v}`);
  }
  if (r.maxSustainedWindKt != null && (!Number.isFinite(r.maxSustainedWindKt) || r.maxSustainedWindKt < 0)) {
    throw fail(`maxSustainedWindKt must be a non-negative number, got ${r.maxSustainedWindKt}`);
  }
  if (r.centralPressureHpa != null && !Number.isFinite(r.centralPressureHpa)) {
    throw fail(`centralPressureHpa must be finite, got ${r.centralPressureHpa}`);
  }

  return {
    stormId: r.stormId,
    memberId: r.memberId,
    validTime: toIsoUtc(validMs),
    latitude: r.latitude,
    longitude: r.longitude > 180 ? normalizeLongitude(r.longitude) : r.longitude,
    centralPressureHpa: optionalNumber(r.centralPressureHpa),
    maxSustainedWindKt: optionalNumber(r.maxSustainedWindKt),
    windRadius34Km: optionalNumber(r.windRadius34Km),
    windRadius50Km: optionalNumber(r.windRadius50Km),
    windRadius64Km: optionalNumber(r.windRadius64Km),
  };
}

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Groups valid samples per (stormId, memberId), sorted by validTime.
 * Duplicate (stormId, memberId, validTime) keys: first row wins, later rows are rejected.
 * Throws EmptyTrajectoryError when a referenced storm has no valid rows: every storm in the input,
 * or only those in options.stormIds when given. Rows of other storms stay in `rejected`.
 */
export function buildTrajectories(
  rows: readonly unknown[],
  options?: { stormIds?: readonly string[] }
): TrackStoreResult {
  const rejected: MalformedSampleError[] = [];
  const seenKeys = new Set<string>();
  const rowsPerStorm = new Map<string, number>();
  const byMember = new Map<string, TrackSample[]>();

  rows.forEach((row, rowIndex) => {
    const rawId = rawStormId(row);
    if (rawId) rowsPerStorm.set(rawId, (rowsPerStorm.get(rawId) ?? 0) + 1);

    let sample: TrackSample;
    try {
      sample = validateTrackSample(row, rowIndex);
    } catch (err) {
      if (err instanceof MalformedSampleError) {
        rejected.push(err);
        return;
      }
      throw err;
    }

    const key = `${sample.stormId}\u0000${sample.memberId}\u0000${sample.validTime}`;
    if (seenKeys.has(key)) {
      rejected.push(
        new MalformedSampleError({
          rowIndex,
          stormId: sample.stormId,
          reason: `duplicate sample for member ${sample.memberId} at ${sample.validTime}`,
        })
      );
      return;
    }
    seenKeys.add(key);

    const memberKey = `${sample.stormId}\u0000${sample.memberId}`;
    const list = byMember.get(memberKey);
    if (list) list.push(sample);
    else byMember.set(memberKey, [sample]);
  });

  const validStorms = new Set<string>();
  for (const samples of byMember.values()) {
    const first = samples[0];
    if (first) validStorms.add(first.stormId);
  }

  const wanted = options?.stormIds ? new Set(options.stormIds) : null;

  // Only a storm the caller asked for (or every storm, when unfiltered) aborts the run.
  for (const [stormId, count] of rowsPerStorm) {
    if (validStorms.has(stormId)) continue;
    if (wanted && !wanted.has(stormId)) {
      dwarn(`[trackStore] ${stormId}: all ${count} rows malformed, storm not requested`);
      continue;
    }
    throw new EmptyTrajectoryError(stormId, `all ${count} rows malformed`);
  }

  if (wanted) {
    for (const stormId of wanted) {
      if (!validStorms.has(stormId)) throw new EmptyTrajectoryError(stormId);
    }
  }

  const trajectories: Trajectory[] = [];
  for (const samples of byMember.values()) {
    const first = samples[0];
    if (!first || (wanted && !wanted.has(first.stormId))) continue;
    const sorted = [...samples].sort((a, b) => Date.parse(a.validTime) - Date.parse(b.validTime));
    trajectories.push({ stormId: first.stormId, memberId: first.memberId, samples: sorted });
  }
  trajectories.sort((a, b) => compareStrings(a.stormId, b.stormId) || compareStrings(a.memberId, b.memberId));

  const stormIds = [...new Set(trajectories.map((t) => t.stormId))];

  if (rejected.length > 0) dwarn(`[trackStore] rejected ${rejected.length} of ${rows.length} rows`);
  dlog("[trackStore] built", { storms: stormIds.length, trajectories: trajectories.length });

  return { trajectories, rejected, stormIds };
}
