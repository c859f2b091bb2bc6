import { randomUUID } from "node:crypto";
import dayjs, { type Dayjs } from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import utc from "dayjs/plugin/utc.js";
import type {
  AvailabilityInfo,
  BookEventInput,
  CalendarEvent,
  CancelEventInput,
  CheckAvailabilityInput,
  DailyReport,
  DailyReportInput,
  ScheduledEvent,
  TimeWindow,
} from "../types/calendar.types.js";
import {
  ArgumentError,
  ErrorCode,
  LookupError,
  ParseError,
  type ServiceResult,
  toCalendarError,
} from "../types/errors.js";
import type { EventStore } from "./EventStore.js";
import { createLogger } from "./Logger.js";

dayjs.extend(customParseFormat);
dayjs.extend(utc);

const DAY_FORMAT = "YYYY-MM-DD";

// Numeric date, optional time of day, optional UTC offset
const NUMERIC_TIMESTAMP =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Inclusive interval intersection: touching endpoints count as overlap.
 */
export function overlapsWindow(
  slot: { start: Date; end: Date },
  window: TimeWindow,
): boolean {
  return (
    slot.start.getTime() <= window.end.getTime() &&
    slot.end.getTime() >= window.start.getTime()
  );
}

function offsetMinutes(offset: string): number {
  if (offset.toUpperCase() === "Z") return 0;
  const digits = offset.slice(1).replace(":", "");
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  return offset.startsWith("-") ? -minutes : minutes;
}

/**
 * Numeric timestamps are checked field by field, so `2026-02-30` is rejected
 * instead of rolling over into March. An explicit offset is kept on the
 * result; without one the time is local.
 */
function readTimestamp(value: string): Dayjs | undefined {
  const text = value.trim();
  const match = NUMERIC_TIMESTAMP.exec(text);

  if (!match) {
    const parsed = dayjs(text);
    return parsed.isValid() ? parsed : undefined;
  }

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const fields = [year, month, day, hour ?? "0", minute ?? "0", second ?? "0"].map(
    Number,
  );
  const [y, mo, d, h, mi, s] = fields;
  const ms = Number((fraction ?? "").slice(0, 3).padEnd(3, "0"));

  const wallClock = dayjs.utc(Date.UTC(y, mo - 1, d, h, mi, s, ms));
  const actual = [
    wallClock.year(),
    wallClock.month() + 1,
    wallClock.date(),
    wallClock.hour(),
    wallClock.minute(),
    wallClock.second(),
  ];
  if (actual.some((field, index) => field !== fields[index])) {
    return undefined;
  }

  if (offset === undefined) {
    return dayjs(new Date(y, mo - 1, d, h, mi, s, ms));
  }
  const minutes = offsetMinutes(offset);
  return dayjs
    .utc(wallClock.valueOf() - minutes * 60_000)
    .utcOffset(minutes);
}

/**
 * Parses the common textual date and date-time forms: ISO 8601 with or
 * without offset, `YYYY-MM-DD HH:mm[:ss]`, and whatever the JavaScript date
 * parser accepts beyond that.
 */
export function parseTimestamp(value: string, field: string): Dayjs {
  const parsed = readTimestamp(value);
  if (!parsed) {
    throw new ParseError(
      `Unable to parse ${field} "${value}"`,
      ErrorCode.INVALID_DATE,
      value,
    );
  }
  return parsed;
}

export function parseDay(value: string): Dayjs {
  const parsed = dayjs(value.trim(), DAY_FORMAT, true);
  if (!parsed.isValid()) {
    throw new ParseError(
      `Invalid date "${value}", expected ${DAY_FORMAT}`,
      ErrorCode.INVALID_DATE,
      value,
    );
  }
  return parsed;
}

export class CalendarService {
  private logger = createLogger("CalendarService");

  constructor(private readonly store: EventStore) {}

  bookEvent(input: BookEventInput): ServiceResult<CalendarEvent> {
    return this.run("bookEvent", () => {
      const start = parseTimestamp(input.startTime, "start_time");
      const end = parseTimestamp(input.endTime, "end_time");

      const event: CalendarEvent = {
        id: randomUUID(),
        summary: input.summary,
        location: input.location ?? "",
        description: input.description ?? "",
        start: start.format(),
        end: end.format(),
        attendees: input.attendees ?? [],
      };

      const events = this.store.load();
      events.push(event);
      this.store.save(events);

      this.logger.info(
        "Event booked",
        { operation: "bookEvent", service: "CalendarService" },
        { id: event.id, start: event.start, end: event.end },
      );
      return event;
    });
  }

  checkAvailability(
    input: CheckAvailabilityInput,
  ): ServiceResult<AvailabilityInfo> {
    return this.run("checkAvailability", () => {
      const day = parseDay(input.date);
      const customWindow = Boolean(input.startTime && input.endTime);

      const window: TimeWindow =
        input.startTime && input.endTime
          ? {
              start: parseTimestamp(
                `${input.date} ${input.startTime}`,
                "start_time",
              ).toDate(),
              end: parseTimestamp(
                `${input.date} ${input.endTime}`,
                "end_time",
              ).toDate(),
            }
          : this.fullDay(day);

      return {
        date: input.date,
        window,
        customWindow,
        busy: this.eventsInWindow(this.store.load(), window),
      };
    });
  }

  cancelEvent(input: CancelEventInput): ServiceResult<CalendarEvent> {
    return this.run("cancelEvent", () => {
      if (input.eventId) {
        return this.cancelById(input.eventId);
      }
      if (input.eventSummary) {
        return this.cancelBySummary(input.eventSummary);
      }
      throw new ArgumentError(
        "Please provide either event_id or event_summary",
        ErrorCode.MISSING_ARGUMENT,
        "event_id",
      );
    });
  }

  generateDailyReport(input: DailyReportInput): ServiceResult<DailyReport> {
    return this.run("generateDailyReport", () => {
      const day = parseDay(input.date);
      const window = this.fullDay(day);

      const entries = this.eventsInWindow(this.store.load(), window).map(
        (scheduled) => ({
          ...scheduled,
          durationMinutes: scheduled.end.diff(scheduled.start) / 60000,
        }),
      );

      return {
        date: window.start,
        entries,
        totalMinutes: entries.reduce(
          (sum, entry) => sum + entry.durationMinutes,
          0,
        ),
      };
    });
  }

  private cancelById(eventId: string): CalendarEvent {
    const events = this.store.load();
    const target = events.find((event) => event.id === eventId);

    if (!target) {
      throw new LookupError(
        `No event with ID ${eventId} found`,
        ErrorCode.EVENT_NOT_FOUND,
        eventId,
      );
    }

    this.store.save(events.filter((event) => event.id !== eventId));
    this.logger.info(
      "Event canceled",
      { operation: "cancelEvent", service: "CalendarService" },
      { id: eventId },
    );
    return target;
  }

  private cancelBySummary(summary: string): CalendarEvent {
    const events = this.store.load();
    const needle = summary.toLowerCase();
    const matches = events.filter((event) =>
      event.summary.toLowerCase().includes(needle),
    );

    if (matches.length === 0) {
      throw new LookupError(
        `No event found with summary '${summary}'`,
        ErrorCode.EVENT_NOT_FOUND,
        summary,
      );
    }

    if (matches.length > 1) {
      throw new LookupError(
        `Found ${matches.length} events matching '${summary}'`,
        ErrorCode.AMBIGUOUS_MATCH,
        summary,
        matches,
      );
    }

    const [target] = matches;
    this.store.save(events.filter((event) => event.id !== target.id));
    this.logger.info(
      "Event canceled",
      { operation: "cancelEvent", service: "CalendarService" },
      { id: target.id, summary },
    );
    return target;
  }

  private fullDay(day: Dayjs): TimeWindow {
    return {
      start: day.startOf("day").toDate(),
      end: day.endOf("day").toDate(),
    };
  }

  private eventsInWindow(
    events: CalendarEvent[],
    window: TimeWindow,
  ): ScheduledEvent[] {
    return events
      .map((event) => this.schedule(event))
      .filter((scheduled) =>
        overlapsWindow(
          { start: scheduled.start.toDate(), end: scheduled.end.toDate() },
          window,
        ),
      );
  }

  private schedule(event: CalendarEvent): ScheduledEvent {
    const start = readTimestamp(event.start);
    const end = readTimestamp(event.end);

    if (!start || !end) {
      throw new ParseError(
        `Stored event ${event.id} has an unparseable time range "${event.start}" - "${event.end}"`,
        ErrorCode.INVALID_DATE,
        start ? event.end : event.start,
      );
    }

    return { event, start, end };
  }

  private run<T>(operation: string, action: () => T): ServiceResult<T> {
    try {
      return { success: true, data: action() };
    } catch (error) {
      const calendarError = toCalendarError(error, {
        operation,
        service: "CalendarService",
      });

      const context = { operation, service: "CalendarService" };
      const data = { code: calendarError.code, error: calendarError.message };

      // Lookup and argument failures are ordinary answers, not faults
      if (
        calendarError instanceof LookupError ||
        calendarError instanceof ArgumentError
      ) {
        this.logger.info(`${operation} rejected`, context, data);
      } else {
        this.logger.error(`${operation} failed`, context, data);
      }

      return { success: false, error: calendarError };
    }
  }
}
