/**
 * Custom error types for the calendar assistant
 * Provides structured error handling with context and categorization
 */

import type { CalendarEvent } from "./calendar.types.js";

export enum ErrorCode {
  // Parse errors
  INVALID_DATE = "INVALID_DATE",
  STORE_CORRUPT = "STORE_CORRUPT",

  // Lookup errors
  EVENT_NOT_FOUND = "EVENT_NOT_FOUND",
  AMBIGUOUS_MATCH = "AMBIGUOUS_MATCH",

  // Argument errors
  MISSING_ARGUMENT = "MISSING_ARGUMENT",
  INVALID_ARGUMENTS = "INVALID_ARGUMENTS",
  UNKNOWN_FUNCTION = "UNKNOWN_FUNCTION",

  // Storage errors
  STORAGE_READ_FAILED = "STORAGE_READ_FAILED",
  STORAGE_WRITE_FAILED = "STORAGE_WRITE_FAILED",
  DUPLICATE_EVENT_ID = "DUPLICATE_EVENT_ID",

  // Configuration errors
  CONFIG_INVALID = "CONFIG_INVALID",

  // Internal errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export interface ErrorContext {
  operation?: string;
  service?: string;
  timestamp?: Date;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all calendar assistant errors
 */
export abstract class CalendarAppError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, context: ErrorContext = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      ...context,
      timestamp: context.timestamp || new Date(),
    };
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a serializable representation of the error
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return this.message;
  }
}

/**
 * Malformed timestamps or backing-file contents
 */
export class ParseError extends CalendarAppError {
  public readonly input?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_DATE,
    input?: string,
    context: ErrorContext = {},
  ) {
    super(message, code, context);
    this.input = input;
  }
}

/**
 * Requested event not found, or a summary matched more than one event
 */
export class LookupError extends CalendarAppError {
  public readonly query: string;
  public readonly matches: CalendarEvent[];

  constructor(
    message: string,
    code: ErrorCode,
    query: string,
    matches: CalendarEvent[] = [],
    context: ErrorContext = {},
  ) {
    super(message, code, context);
    this.query = query;
    this.matches = matches;
  }
}

/**
 * Missing or unexpected arguments, or an unknown function name
 */
export class ArgumentError extends CalendarAppError {
  public readonly field?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_ARGUMENTS,
    field?: string,
    context: ErrorContext = {},
  ) {
    super(message, code, context);
    this.field = field;
  }
}

/**
 * Backing file unreadable or unwritable, or the collection breaks an invariant
 */
export class StorageError extends CalendarAppError {
  public readonly path: string;

  constructor(
    message: string,
    code: ErrorCode,
    path: string,
    context: ErrorContext = {},
  ) {
    super(message, code, context);
    this.path = path;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends CalendarAppError {
  public readonly configKey?: string;

  constructor(message: string, configKey?: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIG_INVALID, context);
    this.configKey = configKey;
  }

  getUserMessage(): string {
    if (this.configKey) {
      return `Configuration error for '${this.configKey}': ${this.message}`;
    }
    return `Configuration error: ${this.message}`;
  }
}

/**
 * Anything that is not one of the categorized errors above
 */
export class InternalError extends CalendarAppError {
  constructor(message: string, context: ErrorContext = {}, stack?: string) {
    super(message, ErrorCode.INTERNAL_ERROR, context);
    if (stack) {
      this.stack = stack;
    }
  }

  getUserMessage(): string {
    return "An unexpected error occurred.";
  }
}

/**
 * Outcome of a calendar operation: the value, or the error that stopped it
 */
export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: CalendarAppError };

/**
 * Convert any thrown value to a CalendarAppError
 */
export function toCalendarError(
  error: unknown,
  context: ErrorContext = {},
): CalendarAppError {
  if (error instanceof CalendarAppError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, context, error.stack);
  }

  return new InternalError(String(error), context);
}
