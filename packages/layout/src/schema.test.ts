import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { parseStoredEvent, storedEventSchema } from "./schema";

const row = {
  id: "7",
  title: "Team sync",
  start: "2025-03-10T09:00",
  end: "2025-03-10 10:30:00",
  color: "#7986CB",
};

describe("parseStoredEvent", () => {
  it("decodes local timestamps into PlainDateTimes", () => {
    const event = Effect.runSync(parseStoredEvent(row));

    expect(event.id).toBe("7");
    expect(event.start.toString()).toBe("2025-03-10T09:00:00");
    expect(event.end.toString()).toBe("2025-03-10T10:30:00");
    expect(event.location).toBeUndefined();
  });

  it("keeps optional location details", () => {
    const event = Effect.runSync(
      parseStoredEvent({
        ...row,
        location: "Main library",
        placeStatus: "Open now",
        aiAdvice: null,
      })
    );

    expect(event.location).toBe("Main library");
    expect(event.placeStatus).toBe("Open now");
    expect(event.aiAdvice).toBeNull();
  });

  it("rejects an event that does not end after it starts", () => {
    const error = Effect.runSync(
      Effect.flip(parseStoredEvent({ ...row, end: "2025-03-10T09:00" }))
    );

    expect(error._tag).toBe("InvalidEventError");
    expect(error.eventId).toBe("7");
    expect(error.message).toBe("end: Event must end after it starts");
  });

  it("rejects an unparseable timestamp", () => {
    const error = Effect.runSync(
      Effect.flip(parseStoredEvent({ ...row, start: "2025-03-10T25:00" }))
    );

    expect(error.eventId).toBe("7");
    expect(error.message).toMatch(/^start: /);
  });

  it("rejects a date that does not exist", () => {
    const error = Effect.runSync(
      Effect.flip(parseStoredEvent({ ...row, start: "2025-02-31T09:00" }))
    );

    expect(error._tag).toBe("InvalidEventError");
    expect(error.eventId).toBe("7");
    expect(error.message).toBe("start: Invalid date-time");
  });

  it("rejects a row that is not an object", () => {
    const error = Effect.runSync(Effect.flip(parseStoredEvent("nope")));

    expect(error._tag).toBe("InvalidEventError");
    expect(error.eventId).toBeUndefined();
  });
});

describe("storedEventSchema", () => {
  it("reports an event ending before it starts on the end field", () => {
    const result = storedEventSchema.safeParse({
      ...row,
      start: "2025-03-10T09:00",
      end: "2025-03-10T08:00",
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.path)).toEqual([["end"]]);
    expect(result.error?.issues[0]?.message).toBe(
      "Event must end after it starts"
    );
  });

  it("does not compare timestamps that failed to decode", () => {
    const result = storedEventSchema.safeParse({
      ...row,
      end: "2025-02-30T10:00",
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.path)).toEqual([["end"]]);
    expect(result.error?.issues[0]?.message).toBe("Invalid date-time");
  });
});
