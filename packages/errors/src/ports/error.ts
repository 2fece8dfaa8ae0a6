export type ErrorCode = Lowercase<string>

/**
 * Structured data attached to an error (paths, option values, ids).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Machine-readable code, e.g. `"sink_unavailable"`. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the operation might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, missing file),
   * `false` for failures the process should not try to continue past.
   *
   * @remarks
   * Logger construction failures are non-operational: a service without a
   * writable log destination is misdeployed, not misused.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used when an error ends up inside a log record.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
