import type { LogLevelName } from "../ports/log-level"

export const DEFAULT_LOG_DIR = "log"
export const DEFAULT_TIME_ZONE = "Asia/Jakarta"

export const DEVELOPMENT_LEVEL: LogLevelName = "debug"
export const PRODUCTION_LEVEL: LogLevelName = "info"

export const SAMPLING = {
  tickMs: 1000,
  initial: 100,
  thereafter: 100,
} as const

export const STDOUT_TOKEN = "stdout"
export const STDERR_TOKEN = "stderr"
