import fs from "node:fs"
import path from "node:path"
import { DEFAULT_LOG_DIR } from "./defaults"
import { LoggerBuildError } from "./errors"

export function resolveLogDirectory(directory: string): string {
  return directory || DEFAULT_LOG_DIR
}

/**
 * Creates `directory` and any missing parents. An existing directory is left
 * as it is.
 */
export function ensureLogDirectory(directory: string): void {
  try {
    fs.mkdirSync(directory, { recursive: true, mode: 0o777 })
  } catch (err) {
    throw new LoggerBuildError(`Cannot create log directory "${directory}"`, {
      code: "log_dir_unavailable",
      context: { directory },
      cause: err,
    })
  }
}

/**
 * `<directory>/<prefix>-<date>.log`, or `<directory>/<date>.log` without a
 * prefix.
 */
export function logFilePath(directory: string, prefix: string, date: string): string {
  const fileName = prefix ? `${prefix}-${date}.log` : `${date}.log`

  return path.join(directory, fileName)
}
