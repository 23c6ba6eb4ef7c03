import { isValid, parseISO } from "date-fns";

export const MS_PER_HOUR = 3_600_000;

const HAS_OFFSET = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses an ISO-like timestamp; strings without an offset are read as UTC.
 * Returns epoch ms or null when unparseable.
 */
export function parseUtcTimestamp(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed) return null;
  let iso = trimmed;
  if (DATE_ONLY.test(iso)) iso = `${iso}T00:00:00Z`;
  else if (!HAS_OFFSET.test(iso)) iso = `${iso.replace(" ", "T")}Z`;
  const date = parseISO(iso);
  return isValid(date) ? date.getTime() : null;
}

/** Canonical ISO-8601 UTC string for epoch ms. */
export function toIsoUtc(ms: number): string {
  return new Date(ms).toISOString();
}

export function hoursBetween(startMs: number, endMs: number): number {
  return (endMs - startMs) / MS_PER_HOUR;
}
