/**
 * Correlation fields a logger can attach to every record it emits.
 *
 * - `trace-id` identifies one logger instance (one session, one job run).
 * - `ref-id` is supplied by the caller to tie records to something it already
 *   has an id for, such as an inbound request.
 */
export type LogContext = {
  "trace-id": string
  "ref-id": string
}

export type InjectedFields = Partial<LogContext>

/**
 * Per-call structured fields. An `err` field is serialized with its cause chain.
 */
export type LogFields = Record<string, unknown>

/** Loosely typed parameters for {@link Logger.log}. */
export type LogParams = Record<string, unknown>
