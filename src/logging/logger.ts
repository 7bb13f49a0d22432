/**
 * Lightweight logging utility.
 *
 * Entries go to the console and, optionally, a log file, each prefixed with
 * a timestamp, level and run ID. Child loggers share their parent's outputs
 * and add context of their own.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  /** Minimum level written */
  level?: LogLevel;
  logDir?: string;
  /** File name inside logDir */
  logFile?: string;
  console?: boolean;
  file?: boolean;
  /** Merged into every entry */
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger that adds `context` to every entry */
  child(context: LogContext): Logger;
}

/** Receives every formatted entry at or above the logger's level */
type Sink = (level: LogLevel, entry: string) => void;

/**
 * `[timestamp] [LEVEL] [runId] message {context}`
 */
export function formatLogEntry(level: LogLevel, message: string, context?: LogContext): string {
  const prefix = `[${new Date().toISOString()}] [${level.toUpperCase().padEnd(5)}] [${getRunId() ?? "no-run-id"}]`;
  const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `${prefix} ${message}${suffix}`;
}

const consoleSink: Sink = (level, entry) => {
  switch (level) {
    case "debug":
      console.debug(entry);
      break;
    case "info":
      console.info(entry);
      break;
    case "warn":
      console.warn(entry);
      break;
    case "error":
      console.error(entry);
      break;
  }
};

function fileSink(logDir: string, logFile: string): Sink {
  mkdirSync(logDir, { recursive: true });
  const path = join(logDir, logFile);
  return (_level, entry) => {
    try {
      appendFileSync(path, entry + "\n");
    } catch (err) {
      console.error(`Failed to write to log file ${path}: ${err}`);
    }
  };
}

function buildLogger(minLevel: LogLevel, base: LogContext, sinks: readonly Sink[]): Logger {
  const threshold = LEVEL_ORDER.indexOf(minLevel);

  const emit = (level: LogLevel) => (message: string, context?: LogContext) => {
    if (LEVEL_ORDER.indexOf(level) < threshold) {
      return;
    }
    const entry = formatLogEntry(level, message, { ...base, ...context });
    for (const sink of sinks) {
      sink(level, entry);
    }
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    child: (context) => buildLogger(minLevel, { ...base, ...context }, sinks),
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sinks: Sink[] = [];
  if (options.console ?? true) {
    sinks.push(consoleSink);
  }
  if (options.file ?? false) {
    sinks.push(fileSink(options.logDir ?? "output/logs", options.logFile ?? "review.log"));
  }
  return buildLogger(options.level ?? "info", options.context ?? {}, sinks);
}

/**
 * Logger that discards everything. Used when a caller passes none.
 */
export function createSilentLogger(): Logger {
  return buildLogger("error", {}, []);
}
