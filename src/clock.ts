// src/clock.ts
import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import timezone from "dayjs/plugin/timezone.js";
import utc from "dayjs/plugin/utc.js";

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

export const DATE_FORMAT = "YYYY-MM-DD";

/** Current wall-clock time in the configured zone. */
export type Clock = () => dayjs.Dayjs;

export function zonedClock(timeZone: string): Clock {
  return () => dayjs().tz(timeZone);
}

/** Clock pinned to a fixed instant, interpreted in `timeZone`. */
export function fixedClock(isoInstant: string, timeZone = "UTC"): Clock {
  const instant = dayjs.tz(isoInstant, timeZone);
  return () => instant;
}

export function localDate(clock: Clock): string {
  return clock().format(DATE_FORMAT);
}

export function addDays(date: string, days: number): string {
  return dayjs(date, DATE_FORMAT, true).add(days, "day").format(DATE_FORMAT);
}

export function isValidDate(date: string): boolean {
  return dayjs(date, DATE_FORMAT, true).isValid();
}

export function formatSlot(hour: number): string {
  return `${String(hour).padStart(2, "0")}:00`;
}

export function isValidSlot(time: string): boolean {
  const m = time.match(/^(\d{2}):00$/);
  if (!m) return false;
  const hour = Number(m[1]);
  return hour >= 0 && hour <= 23;
}

/** DD.MM.YYYY, the date format the city feed expects in its query. */
export function formatFeedDate(date: string): string {
  return dayjs(date, DATE_FORMAT, true).format("DD.MM.YYYY");
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone }).format();
    return true;
  } catch {
    return false;
  }
}
