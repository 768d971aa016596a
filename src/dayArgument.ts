import { format, getDay, subDays } from "date-fns";
import { localDate } from "./time.js";

const WEEKDAYS: Record<string, number> = {
  sunday: 0, sun: 0,
  monday: 1, mon: 1,
  tuesday: 2, tue: 2, tues: 2,
  wednesday: 3, wed: 3,
  thursday: 4, thu: 4, thur: 4, thurs: 4,
  friday: 5, fri: 5,
  saturday: 6, sat: 6,
};

const MONTHS: Record<string, number> = {
  jan: 1, january: 1, feb: 2, february: 2, mar: 3, march: 3,
  apr: 4, april: 4, may: 5, jun: 6, june: 6, jul: 7, july: 7,
  aug: 8, august: 8, sep: 9, sept: 9, september: 9,
  oct: 10, october: 10, nov: 11, november: 11, dec: 12, december: 12,
};

export const DAY_ARGUMENT_FORMATS = [
  "`today`, `yesterday`",
  "`monday`, `tue`, `wednesday`",
  "`dec 02`, `december 2`",
  "`2025-12-02`, `12/02`",
];

/** Calendar date with no time or zone attached; null when the date does not exist. */
function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) return null;
  return date;
}

/** Month/day without a year means the most recent such date, never a future one. */
function mostRecent(today: Date, month: number, day: number): string | null {
  const thisYear = calendarDate(today.getFullYear(), month, day);
  if (thisYear && thisYear <= today) return format(thisYear, "yyyy-MM-dd");
  const lastYear = calendarDate(today.getFullYear() - 1, month, day);
  return lastYear ? format(lastYear, "yyyy-MM-dd") : null;
}

/**
 * Resolves a human day reference ("yesterday", "tue", "dec 02", "2025-12-02",
 * "12/02") to a yyyy-MM-dd date in the given timezone.
 */
export function parseDayArgument(arg: string, timezone: string, now: Date = new Date()): string | null {
  const [y, m, d] = localDate(now, timezone).split("-").map(Number);
  if (y === undefined || m === undefined || d === undefined) return null;
  const today = new Date(y, m - 1, d);
  const input = arg.trim().toLowerCase();

  if (input === "today") return format(today, "yyyy-MM-dd");
  if (input === "yesterday") return format(subDays(today, 1), "yyyy-MM-dd");

  const weekday = WEEKDAYS[input];
  if (weekday !== undefined) {
    // Naming today's weekday means last week's.
    const daysAgo = (getDay(today) - weekday + 7) % 7 || 7;
    return format(subDays(today, daysAgo), "yyyy-MM-dd");
  }

  const monthDay = /^([a-z]+)\s+(\d{1,2})\b/.exec(input);
  if (monthDay) {
    const month = MONTHS[monthDay[1] ?? ""];
    if (month !== undefined) return mostRecent(today, month, Number(monthDay[2]));
  }

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(input);
  if (iso) {
    const date = calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    return date ? format(date, "yyyy-MM-dd") : null;
  }

  const short = /^(\d{1,2})[/-](\d{1,2})$/.exec(input);
  if (short) return mostRecent(today, Number(short[1]), Number(short[2]));

  return null;
}
