import { Temporal } from "temporal-polyfill";
import { calculateEventLayouts } from "./event-layout";
import {
  DAYS_PER_WEEK,
  dayIndexInWeek,
  weekDays,
} from "./temporal-utils";
import type { TimeScale } from "./time-scale";
import type { DayLayout, TimedEvent } from "./types";

/**
 * Bucket a week's events by the day they start on.
 *
 * Events starting outside [weekStart, weekStart + 7 days) are dropped.
 * Each bucket is sorted by start; events with equal starts keep their
 * input order.
 *
 * @returns Seven buckets, index 0 being `weekStart`
 */
export function groupEventsByDay<T extends TimedEvent>(
  events: readonly T[],
  weekStart: Temporal.PlainDate
): T[][] {
  const buckets: T[][] = Array.from({ length: DAYS_PER_WEEK }, () => []);

  for (const event of events) {
    const dayIndex = dayIndexInWeek(event.start.toPlainDate(), weekStart);
    if (dayIndex !== null) {
      buckets[dayIndex]?.push(event);
    }
  }

  for (const bucket of buckets) {
    bucket.sort((a, b) => Temporal.PlainDateTime.compare(a.start, b.start));
  }
  return buckets;
}

/**
 * Lay out every day of the week beginning at `weekStart`.
 */
export function calculateWeekLayout<T extends TimedEvent>(
  events: readonly T[],
  weekStart: Temporal.PlainDate,
  scale: TimeScale
): DayLayout<T>[] {
  const buckets = groupEventsByDay(events, weekStart);
  return weekDays(weekStart).map((date, dayIndex) => ({
    dayIndex,
    date,
    placements: calculateEventLayouts(buckets[dayIndex] ?? [], scale),
  }));
}

export interface CurrentTimePosition {
  dayIndex: number;
  offset: number;
}

/**
 * Where the "now" line goes on the week grid, or null when `now` falls
 * outside the displayed week.
 */
export function currentTimeIndicator(
  now: Temporal.PlainDateTime,
  weekStart: Temporal.PlainDate,
  scale: TimeScale
): CurrentTimePosition | null {
  const dayIndex = dayIndexInWeek(now.toPlainDate(), weekStart);
  if (dayIndex === null) {
    return null;
  }
  return { dayIndex, offset: scale.toOffset(now) };
}
