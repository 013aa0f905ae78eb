import type { Temporal } from "temporal-polyfill";
import { DAYS_PER_WEEK, minutesOfDay } from "./temporal-utils";
import type { TimeScale } from "./time-scale";

export interface GridPoint {
  /** Horizontal position from the left edge of the day columns */
  x: number;
  /** Vertical position from the top of the grid (midnight) */
  y: number;
  /** Combined width of all seven day columns */
  gridWidth: number;
}

export interface GridSlot {
  dayIndex: number;
  date: Temporal.PlainDate;
  time: Temporal.PlainDateTime;
}

export interface ResolveGridPointOptions {
  /** Floor the resolved time to a multiple of this many minutes */
  snapMinutes?: number;
}

/**
 * Resolve a pointer position on the week grid to a day and time.
 * Positions past either edge resolve to the nearest day.
 */
export function resolveGridPoint(
  { x, y, gridWidth }: GridPoint,
  weekStart: Temporal.PlainDate,
  scale: TimeScale,
  { snapMinutes }: ResolveGridPointOptions = {}
): GridSlot {
  const dayWidth = gridWidth / DAYS_PER_WEEK;
  const rawIndex = dayWidth > 0 ? Math.floor(x / dayWidth) : 0;
  const dayIndex = Math.min(DAYS_PER_WEEK - 1, Math.max(0, rawIndex));
  const date = weekStart.add({ days: dayIndex });

  let time = scale.toTime(y, date);
  if (snapMinutes !== undefined && snapMinutes > 0) {
    const excess = minutesOfDay(time) % snapMinutes;
    time = time.subtract({ minutes: excess });
  }

  return { dayIndex, date, time };
}
