import { Schema } from "effect";

export class InvalidCalendarConfigError extends Schema.TaggedError<InvalidCalendarConfigError>()(
  "InvalidCalendarConfigError",
  {
    message: Schema.String,
  }
) {}
