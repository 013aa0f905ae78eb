import { Temporal } from "temporal-polyfill";
import { describe, expect, it } from "vitest";
import { createTimeScale } from "./time-scale";
import type { TimedEvent } from "./types";
import {
  calculateWeekLayout,
  currentTimeIndicator,
  groupEventsByDay,
} from "./week-layout";

const scale = createTimeScale({ unitHeight: 64 });
// Sunday
const weekStart = Temporal.PlainDate.from("2025-03-09");

function event(id: string, start: string, end: string): TimedEvent {
  return {
    id,
    start: Temporal.PlainDateTime.from(start),
    end: Temporal.PlainDateTime.from(end),
  };
}

const mondayLate = event("a", "2025-03-10T10:00", "2025-03-10T11:00");
const mondayEarly = event("b", "2025-03-10T09:00", "2025-03-10T10:30");
const saturday = event("c", "2025-03-15T08:00", "2025-03-15T09:00");
const nextSunday = event("d", "2025-03-16T08:00", "2025-03-16T09:00");
const lastSaturday = event("e", "2025-03-08T08:00", "2025-03-08T09:00");

describe("groupEventsByDay", () => {
  it("buckets events by start day and drops those outside the week", () => {
    const buckets = groupEventsByDay(
      [mondayLate, nextSunday, mondayEarly, saturday, lastSaturday],
      weekStart
    );

    expect(buckets).toHaveLength(7);
    expect(buckets.map((bucket) => bucket.map((e) => e.id))).toEqual([
      [],
      ["b", "a"],
      [],
      [],
      [],
      [],
      ["c"],
    ]);
  });

  it("keeps input order for events with equal starts", () => {
    const first = event("p", "2025-03-11T09:00", "2025-03-11T10:00");
    const second = event("q", "2025-03-11T09:00", "2025-03-11T09:30");
    const buckets = groupEventsByDay([first, second], weekStart);

    expect(buckets[2]?.map((e) => e.id)).toEqual(["p", "q"]);
  });

  it("does not reorder the caller's array", () => {
    const events = [mondayLate, mondayEarly];
    groupEventsByDay(events, weekStart);
    expect(events).toEqual([mondayLate, mondayEarly]);
  });
});

describe("calculateWeekLayout", () => {
  const days = calculateWeekLayout(
    [mondayLate, mondayEarly, saturday],
    weekStart,
    scale
  );

  it("returns one entry per day of the week", () => {
    expect(days.map((day) => day.date.toString())).toEqual([
      "2025-03-09",
      "2025-03-10",
      "2025-03-11",
      "2025-03-12",
      "2025-03-13",
      "2025-03-14",
      "2025-03-15",
    ]);
    expect(days.map((day) => day.dayIndex)).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it("assigns columns in chronological order within a day", () => {
    const monday = days[1]?.placements ?? [];
    expect(
      monday.map((p) => [p.event.id, p.columnIndex, p.horizontalOffset])
    ).toEqual([
      ["b", 0, 0],
      ["a", 1, 0.5],
    ]);
  });

  it("leaves empty days without placements", () => {
    expect(days[0]?.placements).toEqual([]);
    expect(days[6]?.placements).toHaveLength(1);
  });
});

describe("currentTimeIndicator", () => {
  it("positions now within the week", () => {
    const now = Temporal.PlainDateTime.from("2025-03-12T14:30");
    expect(currentTimeIndicator(now, weekStart, scale)).toEqual({
      dayIndex: 3,
      offset: 928,
    });
  });

  it("starts at the top of the first day", () => {
    const now = Temporal.PlainDateTime.from("2025-03-09T00:00");
    expect(currentTimeIndicator(now, weekStart, scale)).toEqual({
      dayIndex: 0,
      offset: 0,
    });
  });

  it("returns null outside the week", () => {
    const now = Temporal.PlainDateTime.from("2025-03-16T00:00");
    expect(currentTimeIndicator(now, weekStart, scale)).toBeNull();
  });
});
