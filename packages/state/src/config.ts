import {
  createTimeScale,
  DEFAULT_UNIT_HEIGHT,
  getSystemTimeZone,
  type Weekday,
} from "@weekgrid/layout";
import { Either, ParseResult, Schema } from "effect";
import { atom } from "jotai/vanilla";
import { Temporal } from "temporal-polyfill";
import { InvalidCalendarConfigError } from "./errors";

/**
 * Calendar configuration provided by the host app.
 */
export interface CalendarConfig {
  /** Height of one hour row, in the renderer's units */
  hourHeight: number;
  /** ISO weekday the grid starts on (7 = Sunday) */
  weekStartsOn: Weekday;
  timeZone: string;
  notifyError?: (error: Error) => void;
}

function isKnownTimeZone(timeZone: string): boolean {
  try {
    Temporal.Now.zonedDateTimeISO(timeZone);
    return true;
  } catch {
    return false;
  }
}

const CalendarConfigSchema = Schema.Struct({
  hourHeight: Schema.Number.pipe(Schema.finite(), Schema.positive()),
  weekStartsOn: Schema.Literal(1, 2, 3, 4, 5, 6, 7),
  timeZone: Schema.NonEmptyString.pipe(
    Schema.filter(isKnownTimeZone, {
      message: () => "Unknown time zone",
    })
  ),
});

const calendarConfigBaseAtom = atom<CalendarConfig>({
  hourHeight: DEFAULT_UNIT_HEIGHT,
  weekStartsOn: 7,
  timeZone: getSystemTimeZone(),
});

/**
 * Current calendar configuration. Writes take a partial update and are
 * validated; an invalid update throws and leaves the config unchanged.
 */
export const calendarConfigAtom = atom(
  (get) => get(calendarConfigBaseAtom),
  (get, set, update: Partial<CalendarConfig>) => {
    const next = { ...get(calendarConfigBaseAtom), ...update };
    const result = Schema.decodeUnknownEither(CalendarConfigSchema)({
      hourHeight: next.hourHeight,
      weekStartsOn: next.weekStartsOn,
      timeZone: next.timeZone,
    });
    if (Either.isLeft(result)) {
      throw new InvalidCalendarConfigError({
        message: ParseResult.TreeFormatter.formatErrorSync(result.left),
      });
    }
    set(calendarConfigBaseAtom, next);
  }
);

/**
 * Time scale for the configured hour height.
 */
export const timeScaleAtom = atom((get) =>
  createTimeScale({ unitHeight: get(calendarConfigAtom).hourHeight })
);
