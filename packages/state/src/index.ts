export {
  currentDateAtom,
  currentWeekStartAtom,
  goToNextWeekAtom,
  goToPreviousWeekAtom,
  goToTodayAtom,
  nowAtom,
  startClock,
  weekDaysAtom,
} from "./atoms/current-week";
export {
  currentTimeIndicatorAtom,
  eventsAtom,
  loadStoredEventsAtom,
  weekLayoutAtom,
} from "./atoms/events";
export {
  type CalendarConfig,
  calendarConfigAtom,
  timeScaleAtom,
} from "./config";
export { InvalidCalendarConfigError } from "./errors";
export {
  type DecodedEvents,
  WeekLayoutService,
} from "./week-layout-service";
