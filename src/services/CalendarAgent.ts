import {
  createCalendarTools,
  formatToolHelp,
  handleCalendarTool,
} from "../tools/calendarTools.js";
import { DIRECTIVE_MARKER, parseDirective } from "../utils/directiveParser.js";
import type { CalendarService } from "./CalendarService.js";
import { createLogger } from "./Logger.js";

export const EXAMPLE_DIRECTIVE = `${DIRECTIVE_MARKER} book_event(summary="Standup", start_time="2026-01-02T09:00:00", end_time="2026-01-02T09:15:00")`;

export function usageMessage(): string {
  return [
    "Please call functions using the format:",
    EXAMPLE_DIRECTIVE,
    "",
    "Available functions:",
    ...createCalendarTools().map(formatToolHelp),
  ].join("\n");
}

/**
 * Turns one input line into an operation call. Only explicit
 * `CALL_FUNCTION:` directives are understood.
 */
export class CalendarAgent {
  private logger = createLogger("CalendarAgent");

  constructor(private readonly calendarService: CalendarService) {}

  run(input: string): string {
    const parsed = parseDirective(input);

    if (!parsed.success) {
      this.logger.debug(
        "No directive recognized",
        { operation: "run", service: "CalendarAgent" },
        { reason: parsed.reason },
      );
      return usageMessage();
    }

    const { name, args } = parsed.directive;
    const timer = this.logger.startTimer(`tool:${name}`, {
      args: Object.keys(args),
    });
    const response = handleCalendarTool(name, args, this.calendarService);
    timer.end(!response.startsWith("❌"));

    return response;
  }
}
