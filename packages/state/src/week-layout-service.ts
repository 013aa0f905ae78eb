import {
  type CalendarEvent,
  calculateWeekLayout,
  type DayLayout,
  dayIndexInWeek,
  type InvalidEventError,
  isDegenerateEvent,
  parseStoredEvent,
  type TimeScale,
} from "@weekgrid/layout";
import { Effect, Either } from "effect";
import type { Temporal } from "temporal-polyfill";

export interface DecodedEvents {
  events: CalendarEvent[];
  rejected: InvalidEventError[];
}

export class WeekLayoutService extends Effect.Service<WeekLayoutService>()(
  "WeekLayoutService",
  {
    accessors: true,
    effect: Effect.gen(function* () {
      const decodeStoredEvents: (
        rows: readonly unknown[]
      ) => Effect.Effect<DecodedEvents> = Effect.fn(
        "WeekLayoutService.decodeStoredEvents"
      )(function* (rows: readonly unknown[]) {
        yield* Effect.annotateCurrentSpan("rowCount", rows.length);
        const events: CalendarEvent[] = [];
        const rejected: InvalidEventError[] = [];

        for (const row of rows) {
          const result = yield* Effect.either(parseStoredEvent(row));
          if (Either.isRight(result)) {
            events.push(result.right);
            continue;
          }
          rejected.push(result.left);
          yield* Effect.logWarning("CALENDAR_EVENT_REJECTED", {
            eventId: result.left.eventId,
            message: result.left.message,
          });
        }

        yield* Effect.annotateCurrentSpan("rejectedCount", rejected.length);
        return { events, rejected };
      });

      const layoutWeek: (
        events: readonly CalendarEvent[],
        weekStart: Temporal.PlainDate,
        scale: TimeScale
      ) => Effect.Effect<DayLayout<CalendarEvent>[]> = Effect.fn(
        "WeekLayoutService.layoutWeek"
      )(function* (
        events: readonly CalendarEvent[],
        weekStart: Temporal.PlainDate,
        scale: TimeScale
      ) {
        yield* Effect.annotateCurrentSpan("weekStart", weekStart.toString());
        yield* Effect.annotateCurrentSpan("eventCount", events.length);

        for (const event of events) {
          const inWeek =
            dayIndexInWeek(event.start.toPlainDate(), weekStart) !== null;
          if (inWeek && isDegenerateEvent(event)) {
            yield* Effect.logWarning("CALENDAR_EVENT_DEGENERATE", {
              eventId: event.id,
              start: event.start.toString(),
              end: event.end.toString(),
            });
          }
        }

        return calculateWeekLayout(events, weekStart, scale);
      });

      return { decodeStoredEvents, layoutWeek };
    }),
  }
) {}
