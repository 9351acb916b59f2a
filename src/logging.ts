/**
 * Structured Logging Interface
 *
 * Every gateway component logs through this interface. Messages are
 * snake_case event names; details travel in the context object.
 */

/**
 * Log levels in order of severity
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Log context data - any JSON-serializable object
 */
export type LogContext = Record<string, unknown>;

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Narrow an arbitrary string (env var, CLI flag) to a LogLevel.
 * Returns undefined when the value is not a known level.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => {
    console.debug(line);
  },
  info: (line) => {
    console.info(line);
  },
  warn: (line) => {
    console.warn(line);
  },
  error: (line) => {
    console.error(line);
  },
};

/**
 * Console logger writing one line per event:
 * `[<ISO time>] <LEVEL> <event> <context JSON>`.
 */
export function createConsoleLogger(minLevel: LogLevel = "info"): StructuredLogger {
  const minValue = LOG_LEVEL_VALUES[minLevel];

  const at =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      if (LOG_LEVEL_VALUES[level] < minValue) return;
      const contextStr = context ? ` ${JSON.stringify(context)}` : "";
      CONSOLE_WRITERS[level](`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${contextStr}`);
    };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}
