import { BaseError, type BaseErrorOptions } from "@logwell/errors"

export type LoggerBuildErrorCode =
  | "log_dir_unavailable"
  | "invalid_time_zone"
  | "sink_unavailable"
  | "engine_unavailable"

/**
 * The environment could not provide what a logger needs. Never operational:
 * nothing the caller retries will fix a missing directory or an unknown zone.
 */
export class LoggerBuildError extends BaseError<LoggerBuildErrorCode> {
  constructor(message: string, options: BaseErrorOptions<LoggerBuildErrorCode>) {
    super(message, { ...options, isOperational: false })
  }
}

export type LoggerConfigErrorCode = "invalid_logger_config"

export class LoggerConfigError extends BaseError<LoggerConfigErrorCode> {
  constructor(message: string, options: BaseErrorOptions<LoggerConfigErrorCode>) {
    super(message, { ...options, isOperational: false })
  }
}
