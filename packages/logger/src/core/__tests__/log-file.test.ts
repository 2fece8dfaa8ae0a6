import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { LoggerBuildError } from "../errors"
import { ensureLogDirectory, logFilePath, resolveLogDirectory } from "../log-file"

describe("resolveLogDirectory", () => {
  it("defaults an empty directory to log", () => {
    expect(resolveLogDirectory("")).toBe("log")
  })

  it("keeps a given directory", () => {
    expect(resolveLogDirectory("/var/log/app")).toBe("/var/log/app")
  })
})

describe("logFilePath", () => {
  it("joins the prefix and date", () => {
    expect(logFilePath("log", "api", "2024-01-15")).toBe(path.join("log", "api-2024-01-15.log"))
  })

  it("omits the separator without a prefix", () => {
    expect(logFilePath("log", "", "2024-01-15")).toBe(path.join("log", "2024-01-15.log"))
  })
})

describe("ensureLogDirectory", () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "logwell-dir-"))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it("accepts an existing directory", () => {
    expect(() => ensureLogDirectory(dir)).not.toThrow()
  })

  it("creates nested directories", () => {
    const nested = path.join(dir, "x", "y")

    ensureLogDirectory(nested)

    expect(fs.statSync(nested).isDirectory()).toBe(true)
  })

  it("throws log_dir_unavailable when a file is in the way", () => {
    const file = path.join(dir, "file")
    fs.writeFileSync(file, "")

    expect(() => ensureLogDirectory(file)).toThrow(LoggerBuildError)
    expect(() => ensureLogDirectory(file)).toThrow(`Cannot create log directory "${file}"`)
  })
})
