import { DateTime } from "luxon";
import { tryGetConfig } from "../config";
import { LogLevelSchema, type LogLevel } from "../config/schema";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Environment variable consulted when no configuration has been loaded,
 * which is always the case for the run-time resolver
 */
export const LOG_LEVEL_ENV = "SYSTEM_TZ_LOG_LEVEL";

/**
 * Get caller file path and line number from stack trace
 * @returns File path relative to src directory and line number, e.g., "resolver/impl/unix.ts:42"
 */
function getCallerLocation(): string {
  const stack = new Error().stack;
  if (!stack) {
    return "unknown:0";
  }

  // Error -> getCallerLocation -> formatMessage -> logger method -> caller
  for (const line of stack.split("\n").slice(1)) {
    if (!line.trim() || /logger[\\/]index\.[tj]s/.test(line)) {
      continue;
    }

    // "    at functionName (file:line:column)" or "    at file:line:column"
    const match = line.match(/\((.+):(\d+):(\d+)\)|at (.+):(\d+):(\d+)/);
    const filePath = match?.[1] ?? match?.[4];
    const lineNumber = match?.[2] ?? match?.[5];
    if (!filePath || !lineNumber) {
      continue;
    }

    const normalized = filePath.replace(/\\/g, "/");
    for (const root of ["/src/", "/dist/"]) {
      const rootIndex = normalized.lastIndexOf(root);
      if (rootIndex !== -1) {
        return `${normalized.substring(rootIndex + root.length)}:${lineNumber}`;
      }
    }
    const fileName = normalized.split("/").pop() || normalized;
    return `${fileName}:${lineNumber}`;
  }
  return "unknown:0";
}

/**
 * Get the current log level from configuration, then from the environment
 */
export function getLogLevel(): LogLevel {
  const configured = tryGetConfig()?.logging?.level;
  if (configured) {
    return configured;
  }

  const fromEnv = LogLevelSchema.safeParse(
    process.env[LOG_LEVEL_ENV]?.trim().toLowerCase()
  );
  return fromEnv.success ? fromEnv.data : "info";
}

/**
 * Check if a log level should be output based on configuration
 */
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

function formatArg(arg: unknown): string {
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

/**
 * Format log message with timestamp, level, and caller location
 */
export function formatMessage(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = DateTime.local().toISO();
  const prefix = `[${timestamp}] [${level.toUpperCase()}] [${getCallerLocation()}]`;

  if (args.length === 0) {
    return `${prefix} ${message}`;
  }
  return `${prefix} ${message} ${args.map(formatArg).join(" ")}`;
}

/**
 * Logger interface
 */
export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (shouldLog("debug")) {
      console.debug(formatMessage("debug", message, ...args));
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (shouldLog("info")) {
      console.info(formatMessage("info", message, ...args));
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (shouldLog("warn")) {
      console.warn(formatMessage("warn", message, ...args));
    }
  },

  error(message: string, ...args: unknown[]): void {
    if (shouldLog("error")) {
      console.error(formatMessage("error", message, ...args));
    }
  },
};
