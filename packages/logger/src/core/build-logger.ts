import { type IdGenerator, requestId } from "@logwell/id"
import { prettyFactory } from "pino-pretty"
import { systemClock } from "../adapters/clock/system-clock"
import { createEngine } from "../adapters/pino/create-engine"
import { RoutedPinoLogger } from "../adapters/pino/routed-pino-logger"
import { openSinks, type SinkStream } from "../adapters/pino/sink-streams"
import type { Clock } from "../ports/clock"
import type { LogOptions } from "../ports/log-options"
import type { RoutedLogger } from "../ports/logger"
import { encodingPolicy } from "./encoding-policy"
import { LoggerBuildError } from "./errors"
import { injectedFields } from "./injected-fields"
import { ensureLogDirectory, logFilePath, resolveLogDirectory } from "./log-file"
import type { LoggerConfig } from "./logger-config"
import { resolveSinks, type SinkTarget } from "./sinks"
import { resolveTimeZone, ZonedFormat } from "./zoned-format"

export type BuildLoggerDeps = {
  clock?: Clock
  /** Source of `trace-id` values. */
  traceId?: IdGenerator<string>
  /** Called by `fatal` after flushing. @default process.exit */
  exit?: (code: number) => void
  /** Receives sink failures that happen after construction. @default process.stderr */
  errorOutput?: (line: string) => void
  /** Replaces the process stream behind the `"stdout"` token. */
  stdout?: SinkStream
  /** Replaces the process stream behind the `"stderr"` token. */
  stderr?: SinkStream
}

function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`)
}

function prettyRenderer(): (line: string, target: SinkTarget) => string {
  const plain = prettyFactory({ colorize: false, translateTime: false })
  const colored = prettyFactory({ colorize: true, translateTime: false })

  return (line, target) => {
    const tty =
      (target.kind === "stdout" && process.stdout.isTTY) ||
      (target.kind === "stderr" && process.stderr.isTTY)

    return tty ? colored(line) : plain(line)
  }
}

/**
 * Builds a logger writing to `<directory>/[<filePrefix>-]<date>.log` and to
 * every entry of `options.outputs`.
 *
 * @example
 * ```ts
 * const logger = buildLogger("var/log", "billing", { withTrace: true, outputs: ["stdout"] })
 *
 * logger.info("invoice sent", { invoice: "inv-1" })
 * logger.getOutputFile() // "var/log/billing-2024-03-05.log"
 * ```
 *
 * @throws LoggerBuildError when the time zone is unknown, the directory cannot
 * be created, or a sink cannot be opened.
 */
export function buildLogger(
  directory: string,
  filePrefix: string,
  options: LogOptions = {},
  deps: BuildLoggerDeps = {},
): RoutedLogger {
  const clock = deps.clock ?? systemClock
  const errorOutput = deps.errorOutput ?? writeToStderr

  const timeZone = resolveTimeZone(options.timeZone)
  const zoned = new ZonedFormat(timeZone)

  const logDirectory = resolveLogDirectory(directory)
  ensureLogDirectory(logDirectory)

  const outputFile = logFilePath(logDirectory, filePrefix, zoned.date(clock.now()))
  const policy = encodingPolicy(options.development ?? false)

  const fields = injectedFields(
    { withTrace: options.withTrace ?? false, refId: options.refId ?? "" },
    deps.traceId ?? requestId,
  )

  const sinks = openSinks(resolveSinks(outputFile, options.outputs ?? []), {
    errorOutput,
    ...(policy.encoding === "pretty" && { render: prettyRenderer() }),
    ...(deps.stdout && { stdout: deps.stdout }),
    ...(deps.stderr && { stderr: deps.stderr }),
  })

  try {
    const engine = createEngine({ policy, zoned, clock, sinks })

    return new RoutedPinoLogger(engine.child(fields), {
      outputFile,
      timeZone,
      sinks,
      exit: deps.exit ?? ((code) => process.exit(code)),
    })
  } catch (err) {
    sinks.close()

    throw new LoggerBuildError("Cannot start the logging engine", {
      code: "engine_unavailable",
      cause: err,
    })
  }
}

export const createLogger = buildLogger

export function buildLoggerFromConfig(config: LoggerConfig, deps: BuildLoggerDeps = {}): RoutedLogger {
  return buildLogger(config.directory, config.prefix, config.options, deps)
}
