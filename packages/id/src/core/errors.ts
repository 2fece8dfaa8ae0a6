import { BaseError, type BaseErrorOptions } from "@logwell/errors"

export type IdErrorCode = "id_generation_failed" | "invalid_request_id"

export class IdGenerationError extends BaseError<IdErrorCode> {
  constructor(message: string, options: BaseErrorOptions<IdErrorCode>) {
    super(message, { isOperational: options.code === "invalid_request_id", ...options })
  }
}
