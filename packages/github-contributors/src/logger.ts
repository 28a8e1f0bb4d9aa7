import { appendFileSync } from "fs";
import { format } from "date-fns";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  repository?: string;
  url?: string;
  error?: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createLogger(...sinks: LogSink[]): Logger {
  const emit =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      const entry: LogEntry = { level, message, timestamp: new Date(), context };
      for (const sink of sinks) {
        sink(entry);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const silentLogger: Logger = createLogger();

/**
 * Decompose accented characters and drop everything outside ASCII so the log
 * file stays readable regardless of what commit authors put in their names.
 */
export function toAscii(message: string): string {
  return message.normalize("NFKD").replace(/[^\u0000-\u007f]/g, "");
}

export function formatLogLine(entry: LogEntry): string {
  const timestamp = format(entry.timestamp, "yyyy-MM-dd HH:mm:ss");
  return `${timestamp} [${LEVEL_LABELS[entry.level]}] ${toAscii(entry.message)}`;
}

/**
 * Appends one line per entry. Each entry is a single synchronous append, so
 * lines from concurrent repository jobs never interleave mid-line.
 */
export function fileSink(filePath: string): LogSink {
  return (entry) => {
    appendFileSync(filePath, `${formatLogLine(entry)}\n`, "utf8");
  };
}

export function consoleSink(minLevel: LogLevel = "debug"): LogSink {
  return (entry) => {
    if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minLevel]) return;

    const line = `[${LEVEL_LABELS[entry.level]}] ${entry.message}`;
    if (entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
}
