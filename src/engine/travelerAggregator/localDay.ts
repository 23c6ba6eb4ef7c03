/**
 * Airport-local civil days. Day boundaries are local midnights, so a day can be 23 h or 25 h long.
 */

import { addHours } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

export type LocalDay = {
  /** YYYY-MM-DD in the airport's zone. */
  date: string;
  startMs: number;
  endMs: number;
};

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function localDateOf(ms: number, timeZone: string): string {
  return formatInTimeZone(ms, timeZone, "yyyy-MM-dd");
}

export function localDayBounds(date: string, timeZone: string): LocalDay {
  const startMs = fromZonedTime(`${date}T00:00:00`, timeZone).getTime();
  // 36 h past local midnight always lands inside the next local day
  const nextDate = formatInTimeZone(addHours(startMs, 36), timeZone, "yyyy-MM-dd");
  const endMs = fromZonedTime(`${nextDate}T00:00:00`, timeZone).getTime();
  return { date, startMs, endMs };
}

/** Local days overlapping [startMs, endMs); a zero-length window still yields its own day. */
export function localDaysSpanning(startMs: number, endMs: number, timeZone: string): LocalDay[] {
  const first = localDayBounds(localDateOf(startMs, timeZone), timeZone);
  const days: LocalDay[] = [];
  let day = first;
  while (day.startMs < endMs) {
    days.push(day);
    day = localDayBounds(localDateOf(day.endMs, timeZone), timeZone);
  }
  return days.length > 0 ? days : [first];
}
