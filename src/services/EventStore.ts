import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import * as v from "valibot";
import type { CalendarEvent, EventCollection } from "../types/calendar.types.js";
import { ErrorCode, ParseError, StorageError } from "../types/errors.js";
import { eventCollectionSchema } from "../validation/schemas.js";
import { createLogger } from "./Logger.js";

/**
 * Whole-file JSON persistence for the event collection.
 *
 * Every load reads the entire file and every save rewrites it in place.
 * There is no locking: two processes doing load, mutate, save on the same
 * file can lose each other's writes.
 */
export class EventStore {
  private logger = createLogger("EventStore");

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  load(): CalendarEvent[] {
    this.ensureFile();

    let raw: string;
    try {
      raw = readFileSync(this.filePath, "utf-8");
    } catch (error) {
      throw this.storageError(error, ErrorCode.STORAGE_READ_FAILED, "load");
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new ParseError(
        `Calendar file ${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.STORE_CORRUPT,
        undefined,
        { operation: "load", service: "EventStore" },
      );
    }

    const result = v.safeParse(eventCollectionSchema, document);
    if (!result.success) {
      const messages = result.issues.map((issue) => issue.message);
      throw new ParseError(
        `Calendar file ${this.filePath} has an invalid structure: ${messages.join("; ")}`,
        ErrorCode.STORE_CORRUPT,
        undefined,
        { operation: "load", service: "EventStore" },
      );
    }

    this.logger.debug(
      `Loaded ${result.output.events.length} events`,
      { operation: "load", service: "EventStore" },
      { path: this.filePath },
    );
    return result.output.events;
  }

  save(events: CalendarEvent[]): void {
    const seen = new Set<string>();
    for (const event of events) {
      if (seen.has(event.id)) {
        throw new StorageError(
          `Refusing to save: duplicate event id ${event.id}`,
          ErrorCode.DUPLICATE_EVENT_ID,
          this.filePath,
          { operation: "save", service: "EventStore" },
        );
      }
      seen.add(event.id);
    }

    this.write({ events });
    this.logger.debug(
      `Saved ${events.length} events`,
      { operation: "save", service: "EventStore" },
      { path: this.filePath },
    );
  }

  private ensureFile(): void {
    if (existsSync(this.filePath)) return;

    this.logger.info(
      "Creating empty calendar file",
      { operation: "ensureFile", service: "EventStore" },
      { path: this.filePath },
    );
    this.write({ events: [] });
  }

  private write(collection: EventCollection): void {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      writeFileSync(
        this.filePath,
        `${JSON.stringify(collection, null, 2)}\n`,
        "utf-8",
      );
    } catch (error) {
      throw this.storageError(error, ErrorCode.STORAGE_WRITE_FAILED, "save");
    }
  }

  private storageError(
    error: unknown,
    code: ErrorCode,
    operation: string,
  ): StorageError {
    const reason = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `Calendar file ${operation} failed`,
      { operation, service: "EventStore" },
      { path: this.filePath, error: reason },
    );
    return new StorageError(reason, code, this.filePath, {
      operation,
      service: "EventStore",
    });
  }
}
