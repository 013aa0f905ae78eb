import {
  nowPlainDateTime,
  startOfWeek,
  todayPlainDate,
  weekDays,
} from "@weekgrid/layout";
import { atom, type createStore } from "jotai/vanilla";
import type { Temporal } from "temporal-polyfill";
import { calendarConfigAtom } from "../config";

type Store = ReturnType<typeof createStore>;

const CLOCK_INTERVAL_MS = 60_000;

const nowBaseAtom = atom<Temporal.PlainDateTime | null>(null);

/**
 * Current wall-clock time, refreshed by startClock. Until first set it reads
 * the clock in the configured timezone.
 */
export const nowAtom = atom(
  (get) =>
    get(nowBaseAtom) ?? nowPlainDateTime(get(calendarConfigAtom).timeZone),
  (_get, set, now: Temporal.PlainDateTime) => set(nowBaseAtom, now)
);

const currentDateBaseAtom = atom<Temporal.PlainDate | null>(null);

/**
 * Date the visible week is built around - defaults to today in the
 * configured timezone.
 */
export const currentDateAtom = atom(
  (get) =>
    get(currentDateBaseAtom) ??
    todayPlainDate(get(calendarConfigAtom).timeZone),
  (_get, set, date: Temporal.PlainDate) => set(currentDateBaseAtom, date)
);

/**
 * First day of the visible week.
 */
export const currentWeekStartAtom = atom((get) =>
  startOfWeek(get(currentDateAtom), get(calendarConfigAtom).weekStartsOn)
);

/**
 * The seven dates of the visible week.
 */
export const weekDaysAtom = atom<Temporal.PlainDate[]>((get) =>
  weekDays(get(currentWeekStartAtom))
);

export const goToPreviousWeekAtom = atom(null, (get, set) => {
  set(currentDateAtom, get(currentDateAtom).subtract({ weeks: 1 }));
});

export const goToNextWeekAtom = atom(null, (get, set) => {
  set(currentDateAtom, get(currentDateAtom).add({ weeks: 1 }));
});

export const goToTodayAtom = atom(null, (get, set) => {
  set(currentDateAtom, get(nowAtom).toPlainDate());
});

/**
 * Refresh nowAtom immediately and then on every interval.
 *
 * @returns Function that stops the clock
 */
export function startClock(
  store: Store,
  intervalMs = CLOCK_INTERVAL_MS
): () => void {
  const tick = () => {
    store.set(nowAtom, nowPlainDateTime(store.get(calendarConfigAtom).timeZone));
  };

  tick();
  const interval = setInterval(tick, intervalMs);
  return () => clearInterval(interval);
}
