import { format } from "node:util"
import { sweetenFields } from "../../core/sweeten-fields"
import type { Logger, SugaredLogger } from "../../ports/logger"

type Level = "debug" | "info" | "warn" | "error" | "fatal"

export class PinoSugaredLogger implements SugaredLogger {
  constructor(private readonly base: Logger) {}

  private logw(level: Level, message: string, keysAndValues: readonly unknown[]): void {
    const sweetened = sweetenFields(keysAndValues)

    if (sweetened.invalid.length > 0) {
      this.base.error("Ignored key-value pairs with non-string keys.", {
        invalid: sweetened.invalid,
      })
    }

    if ("dangling" in sweetened) {
      this.base.error("Ignored key without a value.", { ignored: sweetened.dangling })
    }

    this.base[level](message, sweetened.fields)
  }

  private logf(level: Level, template: string, args: readonly unknown[]): void {
    this.base[level](format(template, ...args))
  }

  debugw(message: string, ...keysAndValues: unknown[]): void {
    this.logw("debug", message, keysAndValues)
  }

  infow(message: string, ...keysAndValues: unknown[]): void {
    this.logw("info", message, keysAndValues)
  }

  warnw(message: string, ...keysAndValues: unknown[]): void {
    this.logw("warn", message, keysAndValues)
  }

  errorw(message: string, ...keysAndValues: unknown[]): void {
    this.logw("error", message, keysAndValues)
  }

  fatalw(message: string, ...keysAndValues: unknown[]): void {
    this.logw("fatal", message, keysAndValues)
  }

  debugf(template: string, ...args: unknown[]): void {
    this.logf("debug", template, args)
  }

  infof(template: string, ...args: unknown[]): void {
    this.logf("info", template, args)
  }

  warnf(template: string, ...args: unknown[]): void {
    this.logf("warn", template, args)
  }

  errorf(template: string, ...args: unknown[]): void {
    this.logf("error", template, args)
  }

  fatalf(template: string, ...args: unknown[]): void {
    this.logf("fatal", template, args)
  }

  desugar(): Logger {
    return this.base
  }
}
