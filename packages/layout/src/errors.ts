import { Schema } from "effect";

export class InvalidEventError extends Schema.TaggedError<InvalidEventError>()(
  "InvalidEventError",
  {
    eventId: Schema.optional(Schema.String),
    message: Schema.String,
  }
) {}

export class InvalidLayoutConfigError extends Schema.TaggedError<InvalidLayoutConfigError>()(
  "InvalidLayoutConfigError",
  {
    message: Schema.String,
  }
) {}

export type LayoutError = InvalidEventError | InvalidLayoutConfigError;
