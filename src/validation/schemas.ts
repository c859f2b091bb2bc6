import * as v from "valibot";
import { ArgumentError, ErrorCode } from "../types/errors.js";

// =============================================================================
// SANITIZATION UTILITIES
// =============================================================================

export const sanitizeString = (str: string): string => {
  return str.trim().replace(/[\u0000-\u001F\u007F-\u009F]/g, ""); // Remove control characters
};

/**
 * Directive values cannot carry commas, so attendee lists are `;`-separated.
 */
export const toAttendeeList = (
  value: string | string[] | null | undefined,
): string[] | undefined => {
  if (value === null || value === undefined) return undefined;
  const entries = Array.isArray(value) ? value : value.split(";");
  return entries.map(sanitizeString).filter((entry) => entry.length > 0);
};

// =============================================================================
// BACKING FILE SCHEMAS
// =============================================================================

const storedTextSchema = v.nullish(v.string("Event text fields must be strings"), "");

export const storedEventSchema = v.object({
  id: v.pipe(
    v.string("Event id must be a string"),
    v.minLength(1, "Event id cannot be empty"),
  ),
  summary: storedTextSchema,
  location: storedTextSchema,
  description: storedTextSchema,
  // Timestamps are not validated here; bad values surface when parsed
  start: v.string("Event start must be a string"),
  end: v.string("Event end must be a string"),
  attendees: v.nullish(v.array(v.string("Attendees must be strings")), () => []),
});

export const eventCollectionSchema = v.object({
  events: v.nullish(v.array(storedEventSchema), () => []),
});

// =============================================================================
// OPERATION ARGUMENT SCHEMAS
// =============================================================================

const requiredText = (name: string) =>
  v.string(`Missing required argument "${name}"`);

// `none` in a directive arrives as null and means "not given"
const optionalText = v.pipe(
  v.nullish(v.string("Argument values must be text")),
  v.transform((value) => value ?? undefined),
);

// Key issues are reported by the enclosing object schema
const unexpectedArgument = (issue: v.BaseIssue<unknown>): string => {
  if (issue.expected === "never") {
    return `Unexpected argument ${issue.received}`;
  }
  if (issue.received === "undefined" && issue.expected?.startsWith('"')) {
    return `Missing required argument ${issue.expected}`;
  }
  return issue.message;
};

export const bookEventArgsSchema = v.strictObject(
  {
    summary: requiredText("summary"),
    start_time: requiredText("start_time"),
    end_time: requiredText("end_time"),
    description: optionalText,
    location: optionalText,
    attendees: v.pipe(
      v.nullish(
        v.union(
          [v.string(), v.array(v.string())],
          "Attendees must be text or a list of text",
        ),
      ),
      v.transform(toAttendeeList),
    ),
  },
  unexpectedArgument,
);

export const checkAvailabilityArgsSchema = v.strictObject(
  {
    date: requiredText("date"),
    start_time: optionalText,
    end_time: optionalText,
  },
  unexpectedArgument,
);

export const cancelEventArgsSchema = v.strictObject(
  {
    event_id: optionalText,
    event_summary: optionalText,
    date: optionalText,
  },
  unexpectedArgument,
);

export const dailyReportArgsSchema = v.strictObject(
  {
    date: requiredText("date"),
  },
  unexpectedArgument,
);

// =============================================================================
// SCHEMA TYPE EXPORTS
// =============================================================================

export type BookEventArgs = v.InferOutput<typeof bookEventArgsSchema>;
export type CheckAvailabilityArgs = v.InferOutput<
  typeof checkAvailabilityArgsSchema
>;
export type CancelEventArgs = v.InferOutput<typeof cancelEventArgsSchema>;
export type DailyReportArgs = v.InferOutput<typeof dailyReportArgsSchema>;

// =============================================================================
// VALIDATION UTILITIES
// =============================================================================

export function validateInput<TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, input);
  if (result.success) {
    return result.output;
  }
  const messages = result.issues.map((issue) => issue.message);
  throw new ArgumentError(messages.join("; "), ErrorCode.INVALID_ARGUMENTS);
}
