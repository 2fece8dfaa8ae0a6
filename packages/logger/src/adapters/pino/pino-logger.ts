import type { Logger as PinoBase } from "pino"
import { routeLogCall } from "../../core/route-log-call"
import type { LogFields, LogParams } from "../../ports/log-fields"
import type { Logger, SugaredLogger } from "../../ports/logger"
import { PinoSugaredLogger } from "./pino-sugared-logger"

/** What `fatal` does once the record is written. */
export type FatalHooks = {
  flush(): void
  exit(code: number): void
}

export class PinoLogger implements Logger {
  constructor(
    protected readonly logger: PinoBase,
    protected readonly hooks: FatalHooks,
  ) {}

  trace(message: string, fields?: LogFields): void {
    this.logger.trace({ ...fields }, message)
  }

  debug(message: string, fields?: LogFields): void {
    this.logger.debug({ ...fields }, message)
  }

  info(message: string, fields?: LogFields): void {
    this.logger.info({ ...fields }, message)
  }

  warn(message: string, fields?: LogFields): void {
    this.logger.warn({ ...fields }, message)
  }

  error(message: string, fields?: LogFields): void {
    this.logger.error({ ...fields }, message)
  }

  fatal(message: string, fields?: LogFields): void {
    this.logger.fatal({ ...fields }, message)
    this.hooks.flush()
    this.hooks.exit(1)
  }

  log(message: string, params?: LogParams | null, err?: unknown): void {
    const call = routeLogCall(message, params, err)

    this[call.level](call.message, call.fields)
  }

  child(fields: LogFields): Logger {
    return new PinoLogger(this.logger.child(fields), this.hooks)
  }

  sugar(): SugaredLogger {
    return new PinoSugaredLogger(this)
  }
}
