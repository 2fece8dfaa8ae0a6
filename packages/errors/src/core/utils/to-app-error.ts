import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Convert any thrown value to an AppError.
 *
 * - BaseError passes through unchanged
 * - Error instances are wrapped, keeping their message, with the original as `cause`
 * - Strings become the message; other values are kept under `context.value`
 *
 * Everything that is not already a BaseError is marked non-operational.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (err instanceof BaseError) return err

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  if (typeof err === "string") {
    return new BaseError(err, { code: fallbackCode, isOperational: false })
  }

  return new BaseError("Unknown error", {
    code: fallbackCode,
    context: { value: err },
    isOperational: false,
  })
}
