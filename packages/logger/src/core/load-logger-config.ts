import { z } from "zod"
import { EnvSource } from "../adapters/config/env/env-source"
import type { ConfigSource } from "../ports/config-source"
import { LoggerConfigError } from "./errors"
import { type LoggerConfig, loggerConfigSchema, toLoggerConfig } from "./logger-config"

export type LoadLoggerConfigOptions = {
  /** Applied in order, later sources winning. Defaults to the process environment. */
  sources?: ConfigSource[]
}

export async function loadLoggerConfig({
  sources,
}: LoadLoggerConfigOptions = {}): Promise<LoggerConfig> {
  const merged: Record<string, unknown> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = loggerConfigSchema.safeParse(merged)

  if (!result.success) {
    throw new LoggerConfigError(
      `Logger configuration is invalid:\n${z.prettifyError(result.error)}`,
      {
        code: "invalid_logger_config",
        context: { sources: resolvedSources.map((s) => s.name) },
        cause: result.error,
      },
    )
  }

  return toLoggerConfig(result.data)
}
