import type { LogFields, LogParams } from "./log-fields"

export interface Logger {
  trace(message: string, fields?: LogFields): void
  debug(message: string, fields?: LogFields): void
  info(message: string, fields?: LogFields): void
  warn(message: string, fields?: LogFields): void
  error(message: string, fields?: LogFields): void

  /** Writes the record, flushes every sink, then terminates the process. */
  fatal(message: string, fields?: LogFields): void

  /**
   * Single call site for "it worked" and "it failed".
   *
   * - `err` given: an `error` record whose message is the error's text;
   *   `message` is not used. `params` become fields.
   * - `err` absent: an `info` record with `message` and `params` as fields.
   */
  log(message: string, params?: LogParams | null, err?: unknown): void

  /**
   * Creates a logger that writes to the same sinks and adds `fields` to every
   * record, on top of the fields this logger already adds.
   */
  child(fields: LogFields): Logger

  sugar(): SugaredLogger
}

/**
 * Loosely typed logging: alternating keys and values, or printf-style
 * templates (`%s`, `%d`, `%j`, `%o`).
 */
export interface SugaredLogger {
  debugw(message: string, ...keysAndValues: unknown[]): void
  infow(message: string, ...keysAndValues: unknown[]): void
  warnw(message: string, ...keysAndValues: unknown[]): void
  errorw(message: string, ...keysAndValues: unknown[]): void
  fatalw(message: string, ...keysAndValues: unknown[]): void

  debugf(template: string, ...args: unknown[]): void
  infof(template: string, ...args: unknown[]): void
  warnf(template: string, ...args: unknown[]): void
  errorf(template: string, ...args: unknown[]): void
  fatalf(template: string, ...args: unknown[]): void

  /** The structured logger this one writes through. */
  desugar(): Logger
}

/**
 * A logger bound to a dated log file and any extra sinks.
 */
export interface RoutedLogger extends Logger {
  /** Path of the dated file, e.g. `log/svc-2024-03-05.log`. */
  getOutputFile(): string

  getTimeZone(): string

  /** Writes out anything a sink still holds. Never throws. */
  flush(): void

  /**
   * Flushes and releases file sinks. Records logged afterwards, by this
   * logger or its children, are dropped.
   */
  close(): void
}
