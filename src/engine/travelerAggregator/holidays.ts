/**
 * US travel holiday calendar. Windows are inclusive local dates.
 */

import {
  addDays,
  addWeeks,
  isMonday,
  isThursday,
  isWithinInterval,
  nextMonday,
  nextThursday,
  parseISO,
  previousMonday,
} from "date-fns";

export const HOLIDAY_PERIODS = [
  "thanksgivingWeek",
  "christmasWeek",
  "newYear",
  "springBreak",
  "summerVacation",
  "memorialDay",
  "independenceDay",
  "laborDay",
] as const;
export type HolidayPeriod = (typeof HOLIDAY_PERIODS)[number];

type HolidayWindow = { period: HolidayPeriod; start: Date; end: Date };

const onOrAfter = (d: Date, is: (d: Date) => boolean, next: (d: Date) => Date) => (is(d) ? d : next(d));

function holidayWindows(year: number): HolidayWindow[] {
  const day = (month: number, date: number) => new Date(year, month - 1, date);

  const thanksgiving = addWeeks(onOrAfter(day(11, 1), isThursday, nextThursday), 3);
  const memorialDay = isMonday(day(5, 31)) ? day(5, 31) : previousMonday(day(5, 31));
  const laborDay = onOrAfter(day(9, 1), isMonday, nextMonday);

  return [
    { period: "thanksgivingWeek", start: thanksgiving, end: addDays(thanksgiving, 6) },
    { period: "christmasWeek", start: day(12, 20), end: day(12, 31) },
    { period: "newYear", start: day(1, 1), end: day(1, 5) },
    { period: "newYear", start: day(12, 30), end: day(12, 31) },
    { period: "springBreak", start: day(3, 15), end: day(4, 15) },
    { period: "summerVacation", start: day(6, 15), end: day(8, 15) },
    { period: "memorialDay", start: addDays(memorialDay, -2), end: addDays(memorialDay, 2) },
    { period: "independenceDay", start: day(7, 4), end: day(7, 4) },
    { period: "laborDay", start: addDays(laborDay, -2), end: addDays(laborDay, 2) },
  ];
}

/** Holiday periods containing a local date (YYYY-MM-DD), in HOLIDAY_PERIODS order. */
export function holidayPeriodsOn(date: string): HolidayPeriod[] {
  const d = parseISO(date);
  const hits = new Set(
    holidayWindows(d.getFullYear())
      .filter((w) => isWithinInterval(d, { start: w.start, end: w.end }))
      .map((w) => w.period)
  );
  return HOLIDAY_PERIODS.filter((p) => hits.has(p));
}
