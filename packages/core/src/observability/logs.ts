/**
 * Store event log
 *
 * One line per event on the console:
 *   [<iso time>] [<LEVEL>] [<event>] <root>/<partition> <message> <details JSON>
 *
 * Warnings and errors always print. `CASTRA_LOG_LEVEL` lowers the threshold
 * (`debug` or `info`); `CASTRA_DEBUG` set to anything is the same as `debug`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Events the store emits */
export type StoreEvent =
  | "store.create"
  | "store.open"
  | "store.drop"
  | "partition.write"
  | "query.select"
  | "categories.torn"
  | "directory.fsync";

export interface LogContext {
  /** Store root, or the file the event concerns */
  path?: string;
  /** Partition name, joined onto `path` */
  partition?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Lowest level printed, read from the environment on every call
 */
export function logThreshold(): LogLevel {
  const configured = process.env.CASTRA_LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.CASTRA_DEBUG ? "debug" : "warn";
}

// keys and counters may be bigints or non-finite floats
function detailReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint" || (typeof value === "number" && !Number.isFinite(value))) {
    return String(value);
  }
  return value;
}

/**
 * Render one event as a console line
 */
export function formatLogLine(level: LogLevel, event: StoreEvent, context: LogContext, at = new Date()): string {
  const parts = [`[${at.toISOString()}] [${level.toUpperCase()}] [${event}]`];
  if (context.path) {
    parts.push(context.partition ? `${context.path}/${context.partition}` : context.path);
  }
  if (context.message) {
    parts.push(context.message);
  }
  if (context.details) {
    parts.push(JSON.stringify(context.details, detailReplacer));
  }
  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log(level: LogLevel, event: StoreEvent, context: LogContext = {}): void {
    if (!this.#enabled || LEVEL_RANK[level] < LEVEL_RANK[logThreshold()]) return;
    SINKS[level](formatLogLine(level, event, context));
  }

  debug(event: StoreEvent, context?: LogContext): void {
    this.log("debug", event, context);
  }

  info(event: StoreEvent, context?: LogContext): void {
    this.log("info", event, context);
  }

  warn(event: StoreEvent, context?: LogContext): void {
    this.log("warn", event, context);
  }

  error(event: StoreEvent, context?: LogContext): void {
    this.log("error", event, context);
  }

  /**
   * Silence every level (the CLI's --quiet)
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
