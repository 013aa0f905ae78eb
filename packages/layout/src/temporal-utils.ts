import { Temporal } from "temporal-polyfill";
import type { Weekday } from "./types";

export const MINUTES_PER_DAY = 24 * 60;

/** Number of days shown by the weekly grid */
export const DAYS_PER_WEEK = 7;

/**
 * Return the system timezone identifier.
 */
export function getSystemTimeZone(): string {
  return Temporal.Now.zonedDateTimeISO().timeZoneId;
}

/**
 * Return today's date as a PlainDate in the given timezone.
 */
export function todayPlainDate(
  timeZone = getSystemTimeZone()
): Temporal.PlainDate {
  return Temporal.Now.zonedDateTimeISO(timeZone).toPlainDate();
}

/**
 * Return the current wall-clock time in the given timezone.
 */
export function nowPlainDateTime(
  timeZone = getSystemTimeZone()
): Temporal.PlainDateTime {
  return Temporal.Now.zonedDateTimeISO(timeZone).toPlainDateTime();
}

/**
 * Whole minutes since midnight. Seconds are truncated.
 */
export function minutesOfDay(
  time: Temporal.PlainTime | Temporal.PlainDateTime
): number {
  return time.hour * 60 + time.minute;
}

/**
 * First day of the week containing `date`.
 * Defaults to Sunday-start weeks.
 */
export function startOfWeek(
  date: Temporal.PlainDate,
  weekStartsOn: Weekday = 7
): Temporal.PlainDate {
  const daysSinceStart = (date.dayOfWeek - weekStartsOn + 7) % 7;
  return date.subtract({ days: daysSinceStart });
}

/**
 * The seven dates of the week beginning at `weekStart`.
 */
export function weekDays(weekStart: Temporal.PlainDate): Temporal.PlainDate[] {
  return Array.from({ length: DAYS_PER_WEEK }, (_, i) =>
    weekStart.add({ days: i })
  );
}

/**
 * Day offset of `date` from `weekStart`, or null when outside the week.
 */
export function dayIndexInWeek(
  date: Temporal.PlainDate,
  weekStart: Temporal.PlainDate
): number | null {
  const days = weekStart.until(date, { largestUnit: "days" }).days;
  return days >= 0 && days < DAYS_PER_WEEK ? days : null;
}
