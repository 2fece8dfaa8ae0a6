import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { LoggerBuildError } from "../../../core/errors"
import { resolveSinks } from "../../../core/sinks"
import { openSinks, type SinkStream } from "../sink-streams"
import { readLines } from "./read-records"

describe("openSinks", () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "logwell-sinks-"))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it("opens files for appending", () => {
    const file = path.join(dir, "app.log")
    fs.writeFileSync(file, "existing\n")

    const sinks = openSinks(resolveSinks(file, []), { errorOutput: () => {} })
    sinks.streams[0]?.write("appended\n")
    sinks.close()

    expect(readLines(file)).toEqual(["existing", "appended"])
  })

  it("routes console tokens to the given streams", () => {
    const written: string[] = []
    const stdout: SinkStream = { write: (line) => written.push(`out:${line}`) }
    const stderr: SinkStream = { write: (line) => written.push(`err:${line}`) }

    const sinks = openSinks(resolveSinks(path.join(dir, "app.log"), ["stderr", "stdout"]), {
      errorOutput: () => {},
      stdout,
      stderr,
    })

    expect(sinks.streams).toHaveLength(3)

    sinks.streams[1]?.write("a")
    sinks.streams[2]?.write("b")
    sinks.close()

    expect(written).toEqual(["err:a", "out:b"])
  })

  it("renders each line for its target", () => {
    const file = path.join(dir, "app.log")

    const sinks = openSinks(resolveSinks(file, []), {
      errorOutput: () => {},
      render: (line, target) => `${target.kind}|${line}`,
    })
    sinks.streams[0]?.write("x\n")
    sinks.close()

    expect(readLines(file)).toEqual(["file|x"])
  })

  it("throws sink_unavailable and releases the sinks already opened", () => {
    const blocker = path.join(dir, "blocker")
    fs.writeFileSync(blocker, "")

    const first = path.join(dir, "first.log")

    let caught: unknown

    try {
      openSinks(resolveSinks(first, [path.join(blocker, "nested.log")]), {
        errorOutput: () => {},
      })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(LoggerBuildError)
    expect(caught).toMatchObject({
      code: "sink_unavailable",
      context: { sink: path.join(blocker, "nested.log") },
    })
    expect(fs.existsSync(first)).toBe(true)
  })

  it("close() is idempotent and marks the set closed", () => {
    const sinks = openSinks(resolveSinks(path.join(dir, "app.log"), []), {
      errorOutput: () => {},
    })

    expect(sinks.closed).toBe(false)

    sinks.close()
    sinks.close()

    expect(sinks.closed).toBe(true)
    expect(() => sinks.flush()).not.toThrow()
  })
})
