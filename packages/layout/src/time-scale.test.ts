import { Temporal } from "temporal-polyfill";
import { describe, expect, it } from "vitest";
import { InvalidLayoutConfigError } from "./errors";
import { createTimeScale } from "./time-scale";

const date = Temporal.PlainDate.from("2025-03-10");

describe("createTimeScale", () => {
  const scale = createTimeScale({ unitHeight: 64 });

  it("sizes a full day as 24 hour units", () => {
    expect(scale.dayHeight).toBe(1536);
  });

  it("maps time of day to a linear offset", () => {
    expect(scale.toOffset(Temporal.PlainTime.from("00:00"))).toBe(0);
    expect(scale.toOffset(Temporal.PlainTime.from("09:30"))).toBe(608);
  });

  it("ignores the calendar date and truncates seconds", () => {
    const time = Temporal.PlainDateTime.from("2031-12-01T09:30:45");
    expect(scale.toOffset(time)).toBe(608);
  });

  it("converts minutes to extents", () => {
    expect(scale.toExtent(90)).toBe(96);
  });

  it("maps an offset back to a time on the given date", () => {
    expect(scale.toTime(608, date).toString()).toBe("2025-03-10T09:30:00");
  });

  it("truncates partial minutes when mapping back", () => {
    // 100 / 64 hours = 93.75 minutes
    expect(scale.toTime(100, date).toString()).toBe("2025-03-10T01:33:00");
  });

  it("clamps offsets outside the day", () => {
    expect(scale.toTime(-10, date).toString()).toBe("2025-03-10T00:00:00");
    expect(scale.toTime(scale.dayHeight, date).toString()).toBe(
      "2025-03-10T23:59:00"
    );
  });

  it("works with any positive unit height", () => {
    const unit = createTimeScale({ unitHeight: 1 });
    expect(unit.toOffset(Temporal.PlainTime.from("09:00"))).toBe(9);
    expect(unit.dayHeight).toBe(24);
  });

  it("rejects a non-positive unit height", () => {
    expect(() => createTimeScale({ unitHeight: 0 })).toThrow(
      InvalidLayoutConfigError
    );
    expect(() => createTimeScale({ unitHeight: Number.NaN })).toThrow(
      InvalidLayoutConfigError
    );
  });
});
