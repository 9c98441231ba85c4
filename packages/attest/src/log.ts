/* eslint-disable no-console */

/**
 * Structured, level-based logging: one JSON line per entry.
 * Swap the sink with setLogHandler() (tests, external log systems).
 *
 * Never pass key material or the configured secret as context.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
};

export type LogHandler = (entry: LogEntry) => void;

export type Logger = {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
};

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const consoleHandler: LogHandler = (entry) => {
  const line = JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context });
  if (entry.level === "error") console.error(line);
  else if (entry.level === "warn") console.warn(line);
  else console.log(line);
};

let handler: LogHandler = consoleHandler;
let minLevel: LogLevel = "info";

export function setLogHandler(next: LogHandler | null): void {
  handler = next ?? consoleHandler;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (PRIORITY[level] < PRIORITY[minLevel]) return;
  handler({
    level,
    message,
    context: Object.keys(context).length ? context : undefined,
    timestamp: new Date().toISOString(),
  });
}

export function createLogger(base: Record<string, unknown> = {}): Logger {
  const at = (level: LogLevel) => (message: string, context?: Record<string, unknown>) =>
    emit(level, message, { ...base, ...context });

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    child: (context) => createLogger({ ...base, ...context }),
  };
}

export const logger = createLogger({ svc: "waterseal" });
