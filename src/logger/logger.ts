/**
 * Micro-logger: one line per event on the console, filtered by LOG_LEVEL
 *
 * Line format: [ISO timestamp] [LEVEL] message {json meta}
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type LogFn = (message: string, meta?: LogMeta) => void;

/**
 * Logger with metadata bound to every call (see withContext).
 */
export type ContextLogger = Record<LogLevel, LogFn>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = "info";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Resolve LOG_LEVEL, falling back to "info" on missing or unknown values
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

const minimumPriority = LEVEL_PRIORITY[resolveLogLevel(process.env.LOG_LEVEL)];

/**
 * Render a single log line; empty meta is omitted
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta | undefined,
  timestamp: string,
): string {
  const suffix =
    meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`;
}

function write(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVEL_PRIORITY[level] < minimumPriority) {
    return;
  }
  write(level, formatLogLine(level, message, meta, new Date().toISOString()));
}

export const debug: LogFn = (message, meta) => log("debug", message, meta);
export const info: LogFn = (message, meta) => log("info", message, meta);
export const warn: LogFn = (message, meta) => log("warn", message, meta);
export const error: LogFn = (message, meta) => log("error", message, meta);

/**
 * Create a logger whose calls merge `context` under their own meta
 */
export function withContext(context: LogMeta): ContextLogger {
  const bound =
    (level: LogLevel): LogFn =>
    (message, meta) =>
      log(level, message, { ...context, ...meta });

  return {
    debug: bound("debug"),
    info: bound("info"),
    warn: bound("warn"),
    error: bound("error"),
  };
}
