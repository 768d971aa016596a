import { addDays, format, parseISO } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Calendar date (yyyy-MM-dd) of an instant in the given zone. */
export function localDate(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, "yyyy-MM-dd");
}

export function localClock(instant: Date, timezone: string): string {
  return formatInTimeZone(instant, timezone, "HH:mm");
}

/** [start, end) of a local calendar day as UTC instants. */
export function dayBounds(date: string, timezone: string): { since: Date; until: Date } {
  const next = format(addDays(parseISO(date), 1), "yyyy-MM-dd");
  return {
    since: fromZonedTime(`${date}T00:00:00`, timezone),
    until: fromZonedTime(`${next}T00:00:00`, timezone),
  };
}
