import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";
import { formatRfc3339 } from "./time/format.js";
import { Instant } from "./time/instant.js";
import { unwrap } from "./time/result.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of `[timestamp] LEVEL message` */
  json: boolean;
  clock?: Clock;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Levelled logger for the CLI. Entries are stamped with the injected clock
 * in UTC RFC 3339 at nanosecond precision. warn and error go to stderr so
 * that command output on stdout stays parseable.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = SEVERITY[options.level];
  const clock = options.clock ?? systemClock;

  function render(entry: LogEntry, meta: LogMeta): string {
    if (options.json) return JSON.stringify(entry);

    const tail = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `[${entry.timestamp}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}${tail}`;
  }

  function write(level: LogLevel, message: string, meta: LogMeta): void {
    if (SEVERITY[level] < threshold) return;

    const timestamp = formatRfc3339(unwrap(Instant.fromClock(clock.now())));
    const line = render({ timestamp, level, message, ...meta }, meta);
    if (SEVERITY[level] >= SEVERITY.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  function scoped(defaultMeta: LogMeta): Logger {
    const at =
      (level: LogLevel) =>
      (message: string, meta: LogMeta = {}): void =>
        write(level, message, { ...defaultMeta, ...meta });

    return {
      debug: at("debug"),
      info: at("info"),
      warn: at("warn"),
      error: at("error"),
      child: (childMeta) => scoped({ ...defaultMeta, ...childMeta }),
    };
  }

  return scoped({});
}

/** Discards everything; the default for library code and tests */
export function createNoopLogger(): Logger {
  const discard = (): void => {};
  const logger: Logger = {
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    child: () => logger,
  };
  return logger;
}
