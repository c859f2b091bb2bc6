#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { pathToFileURL } from "node:url";
import dotenv from "dotenv";

import { type AppConfig, loadConfig } from "./config/config.js";
import { CalendarAgent, EXAMPLE_DIRECTIVE } from "./services/CalendarAgent.js";
import { CalendarService } from "./services/CalendarService.js";
import { EventStore } from "./services/EventStore.js";
import { createLogger, logger } from "./services/Logger.js";
import { toCalendarError } from "./types/errors.js";

const EXIT_WORDS = new Set(["quit", "exit", "bye"]);

export interface ReplStreams {
  input: Readable;
  output: Writable;
}

/**
 * Line-oriented front end: one directive per line, answered on the output
 * stream until an exit word, end of input, or close().
 */
export class CalendarRepl {
  private readline?: Interface;
  private logger = createLogger("CalendarRepl");

  constructor(
    private readonly agent: CalendarAgent,
    private readonly streams: ReplStreams,
  ) {}

  async start(): Promise<void> {
    const { input } = this.streams;
    this.readline = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });

    this.write("Local Calendar Assistant\n\n");
    this.write("Use CALL_FUNCTION: ... to run functions. Example:\n");
    this.write(`${EXAMPLE_DIRECTIVE}\n`);
    this.write("Type 'quit' to exit.\n");
    this.prompt();

    for await (const rawLine of this.readline) {
      const line = rawLine.trim();

      if (!line) {
        this.prompt();
        continue;
      }

      if (EXIT_WORDS.has(line.toLowerCase())) {
        this.write("Goodbye\n");
        this.readline.close();
        return;
      }

      this.write(`\nAgent:\n${this.agent.run(line)}\n`);
      this.prompt();
    }

    // End of input, or close() from a signal handler
    this.write("\nGoodbye\n");
  }

  close(): void {
    this.logger.debug("Closing input", {
      operation: "close",
      service: "CalendarRepl",
    });
    this.readline?.close();
  }

  private prompt(): void {
    this.write("\nYou: ");
  }

  private write(text: string): void {
    this.streams.output.write(text);
  }
}

export function createCalendarAgent(config: AppConfig): CalendarAgent {
  const store = new EventStore(config.eventsPath);
  return new CalendarAgent(new CalendarService(store));
}

async function main(): Promise<void> {
  dotenv.config();

  const mainLogger = createLogger("main");
  const config = loadConfig();
  logger.setMinLevel(config.logLevel);
  mainLogger.debug(
    "Configuration loaded",
    { operation: "loadConfiguration", service: "config" },
    { eventsPath: config.eventsPath, logLevel: config.logLevel },
  );

  const repl = new CalendarRepl(createCalendarAgent(config), {
    input: process.stdin,
    output: process.stdout,
  });

  process.on("SIGINT", () => repl.close());
  process.on("SIGTERM", () => repl.close());

  await repl.start();

  const metrics = logger.getPerformanceMetrics();
  mainLogger.debug(
    "Session finished",
    { operation: "shutdown", service: "main" },
    { ...metrics },
  );
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    const calendarError = toCalendarError(error, {
      operation: "main",
      service: "main",
    });

    console.error("Fatal error:", {
      error: calendarError.toJSON(),
      userMessage: calendarError.getUserMessage(),
    });
    process.exit(1);
  });
}
