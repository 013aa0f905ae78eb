import { Effect } from "effect";
import { Temporal } from "temporal-polyfill";
import z from "zod";
import { InvalidEventError } from "./errors";
import type { CalendarEvent } from "./types";

/** YYYY-MM-DD[T or space]HH:mm with optional seconds and fraction */
const LOCAL_DATE_TIME_PATTERN =
  /^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])[T ]([01]\d|2[0-3]):[0-5]\d(:[0-5]\d(\.\d{1,9})?)?$/;

const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;

/**
 * Zod codec: local datetime string ↔ Temporal.PlainDateTime
 * Accepts both the ISO "T" separator and the Postgres space separator.
 */
export const plainDateTimeCodec = z.codec(
  z.string().regex(LOCAL_DATE_TIME_PATTERN),
  z.custom<Temporal.PlainDateTime>(),
  {
    decode: (str, ctx) => {
      // the pattern admits impossible dates such as Feb 31
      try {
        return Temporal.PlainDateTime.from(str.replace(" ", "T"), {
          overflow: "reject",
        });
      } catch {
        ctx.issues.push({
          code: "custom",
          message: "Invalid date-time",
          input: str,
        });
        return z.NEVER;
      }
    },
    encode: (pdt) => pdt.toString(),
  }
);

/**
 * Persisted event row decoded into a CalendarEvent.
 * Rows that end at or before their start are rejected on `end`.
 */
export const storedEventSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
    start: plainDateTimeCodec,
    end: plainDateTimeCodec,
    color: z.string().regex(HEX_COLOR_PATTERN),
    location: z.string().nullish(),
    placeStatus: z.string().nullish(),
    aiAdvice: z.string().nullish(),
  })
  .refine(
    (event) =>
      // ordering is only checked once both timestamps decoded
      !(
        event.start instanceof Temporal.PlainDateTime &&
        event.end instanceof Temporal.PlainDateTime
      ) || Temporal.PlainDateTime.compare(event.end, event.start) > 0,
    { path: ["end"], message: "Event must end after it starts" }
  );

export type StoredEventRow = z.input<typeof storedEventSchema>;

function readEventId(row: unknown): string | undefined {
  if (typeof row === "object" && row !== null && "id" in row) {
    return typeof row.id === "string" ? row.id : undefined;
  }
  return undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}

/**
 * Decode one stored row, failing with InvalidEventError when it is malformed.
 */
export function parseStoredEvent(
  row: unknown
): Effect.Effect<CalendarEvent, InvalidEventError> {
  const result = storedEventSchema.safeParse(row);
  if (result.success) {
    return Effect.succeed(result.data);
  }
  return Effect.fail(
    new InvalidEventError({
      eventId: readEventId(row),
      message: formatIssues(result.error),
    })
  );
}
