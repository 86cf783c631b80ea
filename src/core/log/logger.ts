// src/core/log/logger.ts
// Leveled logger for the runtime. Every sink is an injectable
// `(msg, data?) => void`, console by default.

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export type LogFn = (msg: string, data?: unknown) => void;

export type RuntimeLogger = {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
};

/** Where log lines go; `console` satisfies it. */
export type LogSink = {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
};

const noop: LogFn = () => {};

export const silentLogger: RuntimeLogger = {
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((l) => l === value);
}

/**
 * Create a logger that forwards to `sink` only the levels at or above `level`.
 */
export function createLogger(level: LogLevel, sink: LogSink = console, prefix = "[marl]"): RuntimeLogger {
  const rank = LOG_LEVELS.indexOf(level);
  const gate = (at: Exclude<LogLevel, "silent">): LogFn => {
    if (LOG_LEVELS.indexOf(at) > rank) return noop;
    return (msg, data) => {
      if (data === undefined) sink[at](`${prefix} ${msg}`);
      else sink[at](`${prefix} ${msg}`, data);
    };
  };
  return {
    error: gate("error"),
    warn: gate("warn"),
    info: gate("info"),
    debug: gate("debug"),
  };
}
