import type { Logger as PinoBase } from "pino"
import type { RoutedLogger } from "../../ports/logger"
import { PinoLogger } from "./pino-logger"
import type { SinkSet } from "./sink-streams"

export type RoutedPinoLoggerOptions = {
  outputFile: string
  timeZone: string
  sinks: SinkSet
  exit: (code: number) => void
}

export class RoutedPinoLogger extends PinoLogger implements RoutedLogger {
  private readonly outputFile: string
  private readonly timeZone: string
  private readonly sinks: SinkSet

  constructor(logger: PinoBase, options: RoutedPinoLoggerOptions) {
    super(logger, { flush: () => options.sinks.flush(), exit: options.exit })

    this.outputFile = options.outputFile
    this.timeZone = options.timeZone
    this.sinks = options.sinks
  }

  getOutputFile(): string {
    return this.outputFile
  }

  getTimeZone(): string {
    return this.timeZone
  }

  flush(): void {
    this.sinks.flush()
  }

  close(): void {
    this.sinks.close()
  }
}
