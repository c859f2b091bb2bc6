import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CalendarAgent, usageMessage } from "../src/services/CalendarAgent.js";
import { CalendarService } from "../src/services/CalendarService.js";
import { EventStore } from "../src/services/EventStore.js";
import { handleCalendarTool } from "../src/tools/calendarTools.js";

describe("CalendarAgent", () => {
  let dir: string;
  let store: EventStore;
  let agent: CalendarAgent;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "calendar-agent-"));
    store = new EventStore(join(dir, "events.json"));
    agent = new CalendarAgent(new CalendarService(store));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should answer plain text with usage instructions", () => {
    expect(agent.run("book a meeting with John")).toBe(usageMessage());

    const lines = usageMessage().split("\n");
    expect(lines.slice(0, 4)).toEqual([
      "Please call functions using the format:",
      'CALL_FUNCTION: book_event(summary="Standup", start_time="2026-01-02T09:00:00", end_time="2026-01-02T09:15:00")',
      "",
      "Available functions:",
    ]);
    expect(
      lines
        .filter((line) => line.startsWith("• "))
        .map((line) => line.slice(2, line.indexOf(":"))),
    ).toEqual([
      "book_event",
      "check_availability",
      "cancel_event",
      "generate_daily_report",
    ]);
    expect(lines).toContain("    summary (required): Event title");
    expect(lines).toContain("    attendees: Attendees separated by ';'");
  });

  it("should answer a malformed directive with usage instructions", () => {
    expect(agent.run("CALL_FUNCTION: book_event")).toBe(usageMessage());
  });

  it("should reject unknown functions", () => {
    expect(agent.run('CALL_FUNCTION: delete_calendar(confirm="yes")')).toBe(
      "❌ Unknown function: delete_calendar",
    );
  });

  it("should convert argument binding failures into a message", () => {
    expect(
      agent.run('CALL_FUNCTION: generate_daily_report(day="2026-01-02")'),
    ).toBe(
      '❌ Invalid arguments for generate_daily_report: Missing required argument "date"; Unexpected argument "day"',
    );
  });

  it("should book through a directive exactly as a direct call does", () => {
    const viaDirective = agent.run(
      'CALL_FUNCTION: book_event(summary="X", start_time="2026-02-01T10:00:00", end_time="2026-02-01T11:00:00")',
    );
    const viaDirectiveEvent = store.load()[0];

    const otherDir = mkdtempSync(join(tmpdir(), "calendar-agent-direct-"));
    try {
      const directStore = new EventStore(join(otherDir, "events.json"));
      const direct = handleCalendarTool(
        "book_event",
        {
          summary: "X",
          start_time: "2026-02-01T10:00:00",
          end_time: "2026-02-01T11:00:00",
        },
        new CalendarService(directStore),
      );
      const directEvent = directStore.load()[0];

      expect(viaDirective).toBe(`✅ Event booked. ID: ${viaDirectiveEvent.id}`);
      expect(direct).toBe(`✅ Event booked. ID: ${directEvent.id}`);
      expect({ ...viaDirectiveEvent, id: "" }).toEqual({ ...directEvent, id: "" });
    } finally {
      rmSync(otherDir, { recursive: true, force: true });
    }
  });

  it("should book, find, cancel and free up a standup", () => {
    const booked = agent.run(
      'CALL_FUNCTION: book_event(summary="Standup", start_time="2026-01-02T09:00:00", end_time="2026-01-02T09:15:00")',
    );
    const [standup] = store.load();
    expect(booked).toBe(`✅ Event booked. ID: ${standup.id}`);

    expect(agent.run('CALL_FUNCTION: check_availability(date="2026-01-02")')).toBe(
      `📅 You have 1 meeting(s) on 2026-01-02:\n• Standup at 09:00 (ID: ${standup.id})\n`,
    );

    expect(
      agent.run('CALL_FUNCTION: cancel_event(event_summary="Standup", date=None)'),
    ).toBe("✅ Event 'Standup' canceled");

    expect(agent.run('CALL_FUNCTION: check_availability(date="2026-01-02")')).toBe(
      "✅ You're free on 2026-01-02",
    );
  });

  it("should treat none as an absent optional time", () => {
    agent.run(
      'CALL_FUNCTION: book_event(summary="Review", start_time="2026-01-02T14:00:00", end_time="2026-01-02T15:00:00")',
    );

    expect(
      agent.run(
        'CALL_FUNCTION: check_availability(date="2026-01-02", start_time=none, end_time=none)',
      ),
    ).toMatch(/^📅 You have 1 meeting\(s\) on 2026-01-02:\n• Review at 14:00 /);
  });
});
