export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Warnings and errors go to stderr so reports piped from stdout stay clean. */
export const consoleSink: LogSink = (level, line) => {
  if (level === "warn" || level === "error") console.error(line);
  else console.log(line);
};

export function formatLogLine(level: LogLevel, scope: string, message: string, now: Date = new Date()): string {
  return `${now.toISOString()} [${level.toUpperCase()}] ${scope}: ${message}`;
}

export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = consoleSink): Logger {
  const emit = (at: LogLevel, message: string) => {
    if (rank[at] < rank[level]) return;
    sink(at, formatLogLine(at, scope, message));
  };
  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level, sink)
  };
}
