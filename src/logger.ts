/**
 * Simple structured logger.
 * Outputs JSON lines in production and a readable format otherwise.
 * Everything goes to stderr so stdout stays clean for the CLI summary.
 */

import { env } from "./env";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;

export type LogThreshold = keyof typeof LEVELS;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const IS_PRODUCTION = env.NODE_ENV === "production";

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function parseThreshold(raw: string | undefined): LogThreshold {
  if (!raw) return "warn";
  const key = raw.toLowerCase();
  return isLogThreshold(key) ? key : "warn";
}

let threshold: LogThreshold = parseThreshold(env.LOG_LEVEL);

/**
 * Change the minimum level that gets written. Used by the CLI's --log-level.
 */
export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[threshold];
}

function formatLog(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  } else {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${entry.timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
  }
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (enabled("debug")) {
      console.error(formatLog("debug", message, meta));
    }
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (enabled("info")) {
      console.error(formatLog("info", message, meta));
    }
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (enabled("warn")) {
      console.warn(formatLog("warn", message, meta));
    }
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (enabled("error")) {
      console.error(formatLog("error", message, meta));
    }
  },
};
