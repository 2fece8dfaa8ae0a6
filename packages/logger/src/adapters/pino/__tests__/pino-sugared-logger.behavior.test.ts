import { mock } from "vitest-mock-extended"
import type { Logger } from "../../../ports/logger"
import { PinoSugaredLogger } from "../pino-sugared-logger"

describe("PinoSugaredLogger behavior", () => {
  let base: ReturnType<typeof mock<Logger>>
  let sugared: PinoSugaredLogger

  beforeEach(() => {
    base = mock<Logger>()
    sugared = new PinoSugaredLogger(base)
  })

  it("turns alternating keys and values into fields", () => {
    sugared.infow("user signed in", "user", "u-1", "attempt", 2)

    expect(base.info).toHaveBeenCalledWith("user signed in", { user: "u-1", attempt: 2 })
    expect(base.error).not.toHaveBeenCalled()
  })

  it.each([
    ["debugw", "debug"],
    ["infow", "info"],
    ["warnw", "warn"],
    ["errorw", "error"],
    ["fatalw", "fatal"],
  ] as const)("%s writes at %s", (method, level) => {
    sugared[method]("message", "k", "v")

    expect(base[level]).toHaveBeenCalledWith("message", { k: "v" })
  })

  it("reports a dangling key and keeps the complete pairs", () => {
    sugared.warnw("retrying", "attempt", 3, "orphan")

    expect(base.error).toHaveBeenCalledWith("Ignored key without a value.", { ignored: "orphan" })
    expect(base.warn).toHaveBeenCalledWith("retrying", { attempt: 3 })
  })

  it("reports pairs whose key is not a string", () => {
    sugared.infow("mixed", 1, "one", "k", "v")

    expect(base.error).toHaveBeenCalledWith("Ignored key-value pairs with non-string keys.", {
      invalid: [[1, "one"]],
    })
    expect(base.info).toHaveBeenCalledWith("mixed", { k: "v" })
  })

  it("formats printf-style templates", () => {
    sugared.infof("%s has %d items", "cart", 3)

    expect(base.info).toHaveBeenCalledWith("cart has 3 items")
  })

  it.each([
    ["debugf", "debug"],
    ["warnf", "warn"],
    ["errorf", "error"],
    ["fatalf", "fatal"],
  ] as const)("%s writes at %s", (method, level) => {
    sugared[method]("code %d", 7)

    expect(base[level]).toHaveBeenCalledWith("code 7")
  })

  it("desugar() returns the structured logger", () => {
    expect(sugared.desugar()).toBe(base)
  })
})
