import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { FakeClock } from "../../../adapters/clock/fake-clock"
import { buildLogger } from "../../../core/build-logger"
import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { logLevelNames } from "../../../ports/log-level"
import { readRecords } from "./read-records"

export function pinoHarness(): LoggerHarness {
  return {
    name: "RoutedPinoLogger",
    make: () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logwell-contract-"))
      const logger = buildLogger(dir, "contract", {}, { clock: new FakeClock(0), exit: () => {} })

      const read = (): CapturedLog[] =>
        readRecords(logger.getOutputFile()).map((payload) => ({
          level: logLevelNames.find((name) => name === payload.level) ?? "info",
          payload,
        }))

      return {
        logger,
        read,
        dispose: () => {
          logger.close()
          fs.rmSync(dir, { recursive: true, force: true })
        },
      }
    },
  }
}
