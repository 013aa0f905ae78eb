import {
  type CalendarEvent,
  type CurrentTimePosition,
  currentTimeIndicator,
  type DayLayout,
} from "@weekgrid/layout";
import { Effect } from "effect";
import { atom } from "jotai/vanilla";
import { calendarConfigAtom, timeScaleAtom } from "../config";
import { WeekLayoutService } from "../week-layout-service";
import { currentWeekStartAtom, nowAtom } from "./current-week";

/**
 * Events known to the calendar, as loaded from the host's store.
 */
export const eventsAtom = atom<readonly CalendarEvent[]>([]);

/**
 * Decode stored rows and replace eventsAtom with the valid ones.
 * Rejected rows are logged and passed to the configured notifyError.
 */
export const loadStoredEventsAtom = atom(
  null,
  (get, set, rows: readonly unknown[]) => {
    const { events, rejected } = Effect.runSync(
      WeekLayoutService.decodeStoredEvents(rows).pipe(
        Effect.provide(WeekLayoutService.Default)
      )
    );
    set(eventsAtom, events);

    const { notifyError } = get(calendarConfigAtom);
    for (const error of rejected) {
      notifyError?.(error);
    }
  }
);

/**
 * Placements for every day of the visible week.
 * Recomputed in full whenever the events, week or scale change.
 */
export const weekLayoutAtom = atom<DayLayout<CalendarEvent>[]>((get) =>
  Effect.runSync(
    WeekLayoutService.layoutWeek(
      get(eventsAtom),
      get(currentWeekStartAtom),
      get(timeScaleAtom)
    ).pipe(Effect.provide(WeekLayoutService.Default))
  )
);

/**
 * Position of the "now" line, or null when today is not in the visible week.
 */
export const currentTimeIndicatorAtom = atom<CurrentTimePosition | null>(
  (get) =>
    currentTimeIndicator(
      get(nowAtom),
      get(currentWeekStartAtom),
      get(timeScaleAtom)
    )
);
