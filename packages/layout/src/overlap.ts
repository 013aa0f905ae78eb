import { Temporal } from "temporal-polyfill";
import type { TimedEvent } from "./types";
import { MINUTES_PER_DAY, minutesOfDay } from "./temporal-utils";

/**
 * Half-open minute interval an event covers within its start day.
 */
export interface MinuteSpan {
  startMinute: number;
  endMinute: number;
}

/**
 * Minute span of an event on its start day. An end on a later date is
 * clipped to the following midnight, an end on an earlier date to the
 * preceding one.
 */
export function toMinuteSpan(event: TimedEvent): MinuteSpan {
  const startMinute = minutesOfDay(event.start);
  const dayOrder = Temporal.PlainDate.compare(
    event.end.toPlainDate(),
    event.start.toPlainDate()
  );
  if (dayOrder > 0) {
    return { startMinute, endMinute: MINUTES_PER_DAY };
  }
  if (dayOrder < 0) {
    return { startMinute, endMinute: 0 };
  }
  return { startMinute, endMinute: minutesOfDay(event.end) };
}

/**
 * True when the spans intersect. Back-to-back spans do not overlap.
 */
export function spansOverlap(a: MinuteSpan, b: MinuteSpan): boolean {
  return a.startMinute < b.endMinute && b.startMinute < a.endMinute;
}

/**
 * Check if two events overlap in time of day.
 */
export function overlaps(a: TimedEvent, b: TimedEvent): boolean {
  return spansOverlap(toMinuteSpan(a), toMinuteSpan(b));
}

/**
 * True when an event ends at or before its start on the grid.
 */
export function isDegenerateEvent(event: TimedEvent): boolean {
  const { startMinute, endMinute } = toMinuteSpan(event);
  return endMinute <= startMinute;
}
