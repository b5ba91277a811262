/**
 * Console logger shared by the entry point and injected into services.
 *
 * Messages are printed with a level tag and an optional JSON data record,
 * e.g. `[INFO] [pool] Segment downloaded {"sequence":4}`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
  /** Create a logger that prefixes every message with `scope`. */
  child(scope: string): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Sink the console logger writes to. Swappable for tests.
 */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
}

/**
 * Format one log line. Pure function.
 */
export function formatLogLine(
  level: LogLevel,
  scope: string | null,
  msg: string,
  data?: LogData,
): string {
  const prefix = `[${level.toUpperCase()}]${scope ? ` [${scope}]` : ""}`;
  return data ? `${prefix} ${msg} ${JSON.stringify(data)}` : `${prefix} ${msg}`;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS.indexOf(options.level ?? "info");
  const scope = options.scope ?? null;
  const sink: LogSink = options.sink ?? console;

  function write(level: LogLevel, msg: string, data?: LogData): void {
    if (LOG_LEVELS.indexOf(level) < minLevel) return;
    const line = formatLogLine(level, scope, msg, data);
    if (level === "error") sink.error(line);
    else if (level === "warn") sink.warn(line);
    else sink.log(line);
  }

  return {
    debug: (msg, data) => write("debug", msg, data),
    info: (msg, data) => write("info", msg, data),
    warn: (msg, data) => write("warn", msg, data),
    error: (msg, data) => write("error", msg, data),
    child: (childScope) =>
      createConsoleLogger({
        level: options.level,
        sink,
        scope: scope ? `${scope}:${childScope}` : childScope,
      }),
  };
}

/**
 * Logger that discards everything (default for library use and tests).
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
