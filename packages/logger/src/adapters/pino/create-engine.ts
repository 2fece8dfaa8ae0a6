import pino, { type Logger as PinoBase, type LoggerOptions as PinoOptions } from "pino"
import { errWithCause } from "pino-std-serializers"
import type { EncodingPolicy } from "../../core/encoding-policy"
import { Sampler } from "../../core/sampler"
import type { ZonedFormat } from "../../core/zoned-format"
import type { Clock } from "../../ports/clock"
import { LogLevels } from "../../ports/log-level"
import type { SinkSet } from "./sink-streams"

export type EngineOptions = {
  policy: EncodingPolicy
  zoned: ZonedFormat
  clock: Clock
  sinks: SinkSet
}

function messageOf(args: readonly unknown[]): string {
  const message = args.slice(0, 2).find((value) => typeof value === "string")

  return typeof message === "string" ? message : ""
}

/**
 * The pino instance behind a routed logger: one multistream entry per sink,
 * all at the policy's level so every sink sees the same records.
 */
export function createEngine({ policy, zoned, clock, sinks }: EngineOptions): PinoBase {
  const sampler = policy.sampling ? new Sampler(policy.sampling, clock) : null

  const options: PinoOptions = {
    level: policy.level,
    base: null,
    timestamp: () => `,"time":"${zoned.timestamp(clock.now())}"`,
    serializers: { err: errWithCause },
    ...(policy.encoding === "json" && {
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    }),
    hooks: {
      logMethod(args, method, level) {
        if (sinks.closed) return

        if (sampler && level < LogLevels.Fatal && !sampler.allow(level, messageOf([...args]))) {
          return
        }

        method.apply(this, args)
      },
    },
  }

  const streams = sinks.streams.map((stream) => ({ level: policy.level, stream }))

  return pino(options, pino.multistream(streams))
}
