export { assignColumns } from "./column-assignment";
export {
  InvalidEventError,
  InvalidLayoutConfigError,
  type LayoutError,
} from "./errors";
export { calculateEventLayouts } from "./event-layout";
export {
  type GridPoint,
  type GridSlot,
  type ResolveGridPointOptions,
  resolveGridPoint,
} from "./grid-hit-test";
export {
  isDegenerateEvent,
  type MinuteSpan,
  overlaps,
  spansOverlap,
  toMinuteSpan,
} from "./overlap";
export { countGroupColumns, findOverlapGroups } from "./overlap-groups";
export {
  parseStoredEvent,
  plainDateTimeCodec,
  type StoredEventRow,
  storedEventSchema,
} from "./schema";
export {
  DAYS_PER_WEEK,
  dayIndexInWeek,
  getSystemTimeZone,
  MINUTES_PER_DAY,
  minutesOfDay,
  nowPlainDateTime,
  startOfWeek,
  todayPlainDate,
  weekDays,
} from "./temporal-utils";
export {
  createTimeScale,
  DEFAULT_UNIT_HEIGHT,
  type TimeScale,
  type TimeScaleConfig,
} from "./time-scale";
export type {
  CalendarEvent,
  DayLayout,
  Placement,
  TimedEvent,
  Weekday,
} from "./types";
export {
  type CurrentTimePosition,
  calculateWeekLayout,
  currentTimeIndicator,
  groupEventsByDay,
} from "./week-layout";
