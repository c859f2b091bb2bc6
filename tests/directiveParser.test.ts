import { describe, expect, it } from "vitest";
import { parseDirective } from "../src/utils/directiveParser.js";

describe("parseDirective", () => {
  it("should parse a function name and quoted keyword arguments", () => {
    const result = parseDirective(
      'CALL_FUNCTION: book_event(summary="X", start_time="2026-02-01T10:00:00", end_time="2026-02-01T11:00:00")',
    );

    expect(result).toEqual({
      success: true,
      directive: {
        name: "book_event",
        args: {
          summary: "X",
          start_time: "2026-02-01T10:00:00",
          end_time: "2026-02-01T11:00:00",
        },
      },
    });
  });

  it("should report a missing marker as absent", () => {
    expect(parseDirective("book a meeting tomorrow")).toEqual({
      success: false,
      reason: "absent",
    });
  });

  it("should report a call without an opening parenthesis as malformed", () => {
    expect(parseDirective("CALL_FUNCTION: book_event")).toEqual({
      success: false,
      reason: "malformed",
    });
  });

  it("should accept text before the marker", () => {
    const result = parseDirective(
      "please run CALL_FUNCTION: generate_daily_report(date='2026-01-02')",
    );

    expect(result).toEqual({
      success: true,
      directive: {
        name: "generate_daily_report",
        args: { date: "2026-01-02" },
      },
    });
  });

  it("should map none in any case to null", () => {
    const result = parseDirective(
      'CALL_FUNCTION: cancel_event(event_id=None, event_summary="Standup", date=NONE)',
    );

    expect(result).toEqual({
      success: true,
      directive: {
        name: "cancel_event",
        args: { event_id: null, event_summary: "Standup", date: null },
      },
    });
  });

  it("should treat a quoted none as null too", () => {
    const result = parseDirective('CALL_FUNCTION: f(a="none")');

    expect(result.success && result.directive.args).toEqual({ a: null });
  });

  it("should return no arguments for empty parentheses", () => {
    const result = parseDirective("CALL_FUNCTION: generate_daily_report()");

    expect(result).toEqual({
      success: true,
      directive: { name: "generate_daily_report", args: {} },
    });
  });

  it("should split on every comma, even inside quotes", () => {
    const result = parseDirective(
      'CALL_FUNCTION: book_event(summary="Lunch, team", location="Cafe")',
    );

    // "team" has no "=" and is dropped; the summary keeps its opening quote
    expect(result.success && result.directive.args).toEqual({
      summary: '"Lunch',
      location: "Cafe",
    });
  });

  it("should split each argument on the first equals sign only", () => {
    const result = parseDirective('CALL_FUNCTION: f(description="a=b")');

    expect(result.success && result.directive.args).toEqual({
      description: "a=b",
    });
  });

  it("should strip only one layer of matching quotes", () => {
    const result = parseDirective(`CALL_FUNCTION: f(a="'x'", b='"y"', c="z)`);

    expect(result.success && result.directive.args).toEqual({
      a: "'x'",
      b: '"y"',
      c: '"z',
    });
  });

  it("should use the last closing parenthesis as the end of the arguments", () => {
    const result = parseDirective('CALL_FUNCTION: f(a="(1)") trailing');

    expect(result.success && result.directive.args).toEqual({ a: "(1)" });
  });

  it("should take the rest of the line when the closing parenthesis is missing", () => {
    const result = parseDirective("CALL_FUNCTION: f(a=1, b=2");

    expect(result.success && result.directive).toEqual({
      name: "f",
      args: { a: "1", b: "2" },
    });
  });

  it("should trim keys and values", () => {
    const result = parseDirective("CALL_FUNCTION:   f  (  a  =  1  ,b=  two )");

    expect(result.success && result.directive).toEqual({
      name: "f",
      args: { a: "1", b: "two" },
    });
  });
});
