import { Temporal } from "temporal-polyfill";
import { InvalidLayoutConfigError } from "./errors";
import { MINUTES_PER_DAY, minutesOfDay } from "./temporal-utils";

/** Default height of one hour on the grid */
export const DEFAULT_UNIT_HEIGHT = 64;

export interface TimeScaleConfig {
  /** Height of one hour, in whatever unit the renderer draws with */
  unitHeight: number;
}

/**
 * Linear mapping between time of day and vertical grid offset.
 */
export interface TimeScale {
  readonly unitHeight: number;
  /** Height of a full 24-hour day */
  readonly dayHeight: number;
  /** Offset of a time of day from midnight. The calendar date is ignored. */
  toOffset(time: Temporal.PlainTime | Temporal.PlainDateTime): number;
  /** Vertical size of a span of minutes */
  toExtent(minutes: number): number;
  /** Wall-clock time at `offset` on `date`, clamped into that day */
  toTime(offset: number, date: Temporal.PlainDate): Temporal.PlainDateTime;
}

export function createTimeScale({ unitHeight }: TimeScaleConfig): TimeScale {
  if (!Number.isFinite(unitHeight) || unitHeight <= 0) {
    throw new InvalidLayoutConfigError({
      message: `unitHeight must be a positive number, got ${unitHeight}`,
    });
  }

  const toExtent = (minutes: number) => (minutes / 60) * unitHeight;

  return {
    unitHeight,
    dayHeight: 24 * unitHeight,
    toOffset: (time) => toExtent(minutesOfDay(time)),
    toExtent,
    toTime: (offset, date) => {
      const minutes = Math.trunc((offset / unitHeight) * 60);
      const clamped = Math.min(MINUTES_PER_DAY - 1, Math.max(0, minutes));
      return date
        .toPlainDateTime(Temporal.PlainTime.from("00:00"))
        .add({ minutes: clamped });
    },
  };
}
