import { z } from "zod"
import type { LogOptions } from "../ports/log-options"
import { DEFAULT_TIME_ZONE } from "./defaults"

export const loggerConfigSchema = z.object({
  LOG_DIR: z.string().default(""),
  LOG_PREFIX: z.string().default(""),
  LOG_DEVELOPMENT: z.stringbool().default(false),
  LOG_WITH_TRACE: z.stringbool().default(false),
  LOG_REF_ID: z.string().default(""),
  LOG_OUTPUTS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    ),
  LOG_TIME_ZONE: z.string().default(DEFAULT_TIME_ZONE),
})

export type LoggerEnv = z.infer<typeof loggerConfigSchema>

/** Arguments for `buildLogger`, as read from configuration. */
export type LoggerConfig = {
  directory: string
  prefix: string
  options: Required<LogOptions>
}

export function toLoggerConfig(env: LoggerEnv): LoggerConfig {
  return {
    directory: env.LOG_DIR,
    prefix: env.LOG_PREFIX,
    options: {
      development: env.LOG_DEVELOPMENT,
      withTrace: env.LOG_WITH_TRACE,
      refId: env.LOG_REF_ID,
      outputs: env.LOG_OUTPUTS,
      timeZone: env.LOG_TIME_ZONE,
    },
  }
}
