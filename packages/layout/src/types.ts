import type { Temporal } from "temporal-polyfill";

/**
 * Minimal shape the layout engine needs from an event.
 */
export interface TimedEvent {
  /** Stable identifier, unique within one day */
  id: string;
  /** Wall-clock start */
  start: Temporal.PlainDateTime;
  /** Wall-clock end, expected to be after start */
  end: Temporal.PlainDateTime;
}

/**
 * Calendar event as shown on the weekly grid.
 */
export interface CalendarEvent extends TimedEvent {
  title: string;
  /** CSS hex color, e.g. "#7986CB" */
  color: string;
  location?: string | null;
  /** Opening-hours label for the location, e.g. "Open now" */
  placeStatus?: string | null;
  aiAdvice?: string | null;
}

/**
 * Computed geometry for one event within one day column.
 *
 * Vertical values are in the units of the time scale that produced them.
 * Horizontal values are fractions of the day column width.
 */
export interface Placement<T extends TimedEvent = CalendarEvent> {
  readonly event: T;
  readonly verticalOffset: number;
  readonly verticalExtent: number;
  /** In [0, 1) */
  readonly horizontalOffset: number;
  /** In (0, 1] */
  readonly horizontalExtent: number;
  readonly columnIndex: number;
  /** Columns reserved by this event's overlap group */
  readonly totalColumns: number;
}

/**
 * Placements for one day of a week.
 */
export interface DayLayout<T extends TimedEvent = CalendarEvent> {
  /** 0-based position within the week */
  readonly dayIndex: number;
  readonly date: Temporal.PlainDate;
  readonly placements: readonly Placement<T>[];
}

/** ISO weekday: 1 = Monday ... 7 = Sunday */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;
