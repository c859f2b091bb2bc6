import dayjs from "dayjs";
import type { CalendarService } from "../services/CalendarService.js";
import type {
  AvailabilityInfo,
  CalendarEvent,
  DailyReport,
} from "../types/calendar.types.js";
import {
  ArgumentError,
  type CalendarAppError,
  ErrorCode,
  LookupError,
  toCalendarError,
} from "../types/errors.js";
import {
  bookEventArgsSchema,
  cancelEventArgsSchema,
  checkAvailabilityArgsSchema,
  dailyReportArgsSchema,
  validateInput,
} from "../validation/schemas.js";

export const CALENDAR_TOOL_NAMES = [
  "book_event",
  "check_availability",
  "cancel_event",
  "generate_daily_report",
] as const;

export type CalendarToolName = (typeof CALENDAR_TOOL_NAMES)[number];

export interface CalendarToolParameter {
  name: string;
  description: string;
  required: boolean;
}

export interface CalendarTool {
  name: CalendarToolName;
  description: string;
  parameters: CalendarToolParameter[];
}

const REPORT_RULE = "=".repeat(60);

export function createCalendarTools(): CalendarTool[] {
  return [
    {
      name: "book_event",
      description: "Book a new event in the local calendar",
      parameters: [
        { name: "summary", description: "Event title", required: true },
        {
          name: "start_time",
          description: "Start date and time (e.g. 2026-01-02T14:00:00)",
          required: true,
        },
        {
          name: "end_time",
          description: "End date and time (e.g. 2026-01-02T15:00:00)",
          required: true,
        },
        { name: "description", description: "Free text", required: false },
        { name: "location", description: "Free text", required: false },
        {
          name: "attendees",
          description: "Attendees separated by ';'",
          required: false,
        },
      ],
    },
    {
      name: "check_availability",
      description:
        "List events on a day, or within a time range of that day when both times are given",
      parameters: [
        { name: "date", description: "Day as YYYY-MM-DD", required: true },
        { name: "start_time", description: "Range start (HH:mm)", required: false },
        { name: "end_time", description: "Range end (HH:mm)", required: false },
      ],
    },
    {
      name: "cancel_event",
      description:
        "Cancel an event by id, or by a case-insensitive part of its summary",
      parameters: [
        { name: "event_id", description: "Exact event id", required: false },
        {
          name: "event_summary",
          description: "Text contained in the summary",
          required: false,
        },
        { name: "date", description: "Accepted but not used", required: false },
      ],
    },
    {
      name: "generate_daily_report",
      description: "Summarize every event of a day with durations",
      parameters: [
        { name: "date", description: "Day as YYYY-MM-DD", required: true },
      ],
    },
  ];
}

export function isCalendarTool(name: string): name is CalendarToolName {
  return CALENDAR_TOOL_NAMES.some((toolName) => toolName === name);
}

/**
 * One line for the tool, then one indented line per parameter.
 */
export function formatToolHelp(tool: CalendarTool): string {
  const parameters = tool.parameters.map(
    (parameter) =>
      `    ${parameter.name}${parameter.required ? " (required)" : ""}: ${parameter.description}`,
  );
  return [`• ${tool.name}: ${tool.description}`, ...parameters].join("\n");
}

// =============================================================================
// RESPONSE FORMATTING
// =============================================================================

function formatFailure(action: string, error: CalendarAppError): string {
  if (error instanceof LookupError || error instanceof ArgumentError) {
    return `❌ ${error.message}`;
  }
  return `❌ Error ${action}: ${error.message}`;
}

export function formatBooking(event: CalendarEvent): string {
  return `✅ Event booked. ID: ${event.id}`;
}

export function formatAvailability(info: AvailabilityInfo): string {
  if (info.busy.length === 0) {
    const range = info.customWindow
      ? ` from ${dayjs(info.window.start).format("HH:mm")} to ${dayjs(info.window.end).format("HH:mm")}`
      : "";
    return `✅ You're free on ${info.date}${range}`;
  }

  const lines = info.busy.map(
    ({ event, start }) =>
      `• ${event.summary || "Untitled"} at ${start.format("HH:mm")} (ID: ${event.id})`,
  );
  return `📅 You have ${info.busy.length} meeting(s) on ${info.date}:\n${lines.join("\n")}\n`;
}

export function formatAmbiguousMatch(error: LookupError): string {
  const lines = error.matches.map(
    (event, index) => `${index + 1}. ${event.summary} (ID: ${event.id})`,
  );
  return [
    `Found ${error.matches.length} events matching '${error.query}':`,
    ...lines,
    "Please specify the event_id to cancel a specific event.",
  ].join("\n");
}

export function formatDailyReport(report: DailyReport): string {
  let text = `📊 DAILY CALENDAR REPORT - ${dayjs(report.date).format("dddd, MMMM DD, YYYY")}\n`;
  text += `${REPORT_RULE}\n\n`;

  if (report.entries.length === 0) {
    return `${text}No events scheduled for this day.\n`;
  }

  text += `Total Events: ${report.entries.length}\n\n`;

  report.entries.forEach(({ event, start, end, durationMinutes }, index) => {
    text += `${index + 1}. ${event.summary || "Untitled Event"}\n`;
    text += `   Time: ${start.format("HH:mm")} - ${end.format("HH:mm")}\n`;
    text += `   Duration: ${Math.trunc(durationMinutes)} minutes\n\n`;
  });

  const hours = Math.trunc(report.totalMinutes / 60);
  const minutes = Math.trunc(report.totalMinutes % 60);
  text += `${REPORT_RULE}\n`;
  text += `Total Meeting Time: ${hours}h ${minutes}m\n`;
  return text;
}

// =============================================================================
// TOOL HANDLING
// =============================================================================

/**
 * Binds the keyword arguments to the named operation, runs it and renders
 * the outcome. Never throws: every failure becomes a `❌` line.
 */
export function handleCalendarTool(
  name: string,
  args: Record<string, unknown>,
  calendarService: CalendarService,
): string {
  try {
    if (!isCalendarTool(name)) {
      throw new ArgumentError(
        `Unknown function: ${name}`,
        ErrorCode.UNKNOWN_FUNCTION,
        "function",
      );
    }

    switch (name) {
      case "book_event": {
        const validatedArgs = validateInput(bookEventArgsSchema, args);
        const result = calendarService.bookEvent({
          summary: validatedArgs.summary,
          startTime: validatedArgs.start_time,
          endTime: validatedArgs.end_time,
          description: validatedArgs.description,
          location: validatedArgs.location,
          attendees: validatedArgs.attendees,
        });
        return result.success
          ? formatBooking(result.data)
          : formatFailure("booking event", result.error);
      }

      case "check_availability": {
        const validatedArgs = validateInput(checkAvailabilityArgsSchema, args);
        const result = calendarService.checkAvailability({
          date: validatedArgs.date,
          startTime: validatedArgs.start_time,
          endTime: validatedArgs.end_time,
        });
        return result.success
          ? formatAvailability(result.data)
          : formatFailure("checking availability", result.error);
      }

      case "cancel_event": {
        const validatedArgs = validateInput(cancelEventArgsSchema, args);
        const result = calendarService.cancelEvent({
          eventId: validatedArgs.event_id,
          eventSummary: validatedArgs.event_summary,
          date: validatedArgs.date,
        });
        if (result.success) {
          return validatedArgs.event_id
            ? `✅ Event ${result.data.id} canceled`
            : `✅ Event '${result.data.summary}' canceled`;
        }
        if (
          result.error instanceof LookupError &&
          result.error.code === ErrorCode.AMBIGUOUS_MATCH
        ) {
          return formatAmbiguousMatch(result.error);
        }
        return formatFailure("canceling event", result.error);
      }

      case "generate_daily_report": {
        const validatedArgs = validateInput(dailyReportArgsSchema, args);
        const result = calendarService.generateDailyReport({
          date: validatedArgs.date,
        });
        return result.success
          ? formatDailyReport(result.data)
          : formatFailure("generating report", result.error);
      }
    }
  } catch (error) {
    const calendarError = toCalendarError(error, {
      operation: name,
      service: "calendarTools",
      details: { args },
    });

    if (calendarError.code === ErrorCode.INVALID_ARGUMENTS) {
      return `❌ Invalid arguments for ${name}: ${calendarError.message}`;
    }
    if (calendarError.code === ErrorCode.UNKNOWN_FUNCTION) {
      return `❌ ${calendarError.message}`;
    }
    return `❌ Error executing ${name}: ${calendarError.getUserMessage()}`;
  }
}
