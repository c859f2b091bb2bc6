import { fileURLToPath } from "node:url";
import * as v from "valibot";
import { LogLevel } from "../services/Logger.js";
import { ConfigurationError } from "../types/errors.js";

export interface AppConfig {
  eventsPath: string;
  logLevel: LogLevel;
  debug: boolean;
}

// Resolves to <package root>/samples/events.json from both src/ and dist/
export const DEFAULT_EVENTS_PATH = fileURLToPath(
  new URL("../../samples/events.json", import.meta.url),
);

// Environment variables validation schema
const EnvSchema = v.object({
  CALENDAR_EVENTS_PATH: v.optional(
    v.pipe(v.string(), v.trim(), v.minLength(1, "Events path cannot be empty")),
  ),
  LOG_LEVEL: v.optional(
    v.pipe(
      v.string(),
      v.transform((value) => value.toLowerCase()),
      v.enum(LogLevel, "Unknown log level"),
    ),
  ),
  DEBUG: v.optional(v.picklist(["true", "false"])),
});

function formatValidationError(
  error: v.ValiError<typeof EnvSchema>,
): string {
  const issues = v.flatten<typeof EnvSchema>(error.issues);
  const messages: string[] = [];

  for (const [path, issue] of Object.entries(issues.nested ?? {})) {
    if (Array.isArray(issue)) {
      for (const i of issue) {
        messages.push(`${path}: ${i}`);
      }
    }
  }

  if (issues.root) {
    for (const issue of issues.root) {
      messages.push(`Configuration: ${issue}`);
    }
  }

  return messages.join(", ");
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  try {
    const validatedEnv = v.parse(EnvSchema, env);
    const debug = validatedEnv.DEBUG === "true";

    return {
      eventsPath: validatedEnv.CALENDAR_EVENTS_PATH || DEFAULT_EVENTS_PATH,
      logLevel: debug
        ? LogLevel.DEBUG
        : (validatedEnv.LOG_LEVEL ?? LogLevel.WARNING),
      debug,
    };
  } catch (error) {
    if (v.isValiError<typeof EnvSchema>(error)) {
      throw new ConfigurationError(
        `Configuration validation failed: ${formatValidationError(error)}`,
      );
    }
    throw error;
  }
}
