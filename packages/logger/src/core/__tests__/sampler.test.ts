import { FakeClock } from "../../adapters/clock/fake-clock"
import { LogLevels } from "../../ports/log-level"
import { Sampler } from "../sampler"

describe("Sampler", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(0)
  })

  const admitted = (sampler: Sampler, times: number, message = "m", level: number = LogLevels.Info) =>
    Array.from({ length: times }, () => sampler.allow(level, message)).filter(Boolean).length

  it("admits the first `initial` records, then every `thereafter`-th", () => {
    const sampler = new Sampler({ tickMs: 1000, initial: 3, thereafter: 2 }, clock)

    const decisions = Array.from({ length: 8 }, () => sampler.allow(LogLevels.Info, "m"))

    expect(decisions).toEqual([true, true, true, false, true, false, true, false])
  })

  it("drops everything past `initial` when `thereafter` is 0", () => {
    const sampler = new Sampler({ tickMs: 1000, initial: 2, thereafter: 0 }, clock)

    expect(admitted(sampler, 10)).toBe(2)
  })

  it("starts a new budget once the tick has passed", () => {
    const sampler = new Sampler({ tickMs: 1000, initial: 1, thereafter: 0 }, clock)

    expect(admitted(sampler, 5)).toBe(1)

    clock.advance(999)
    expect(sampler.allow(LogLevels.Info, "m")).toBe(false)

    clock.advance(1)
    expect(sampler.allow(LogLevels.Info, "m")).toBe(true)
  })

  it("keeps separate budgets per level", () => {
    const sampler = new Sampler({ tickMs: 1000, initial: 1, thereafter: 0 }, clock)

    expect(sampler.allow(LogLevels.Info, "m")).toBe(true)
    expect(sampler.allow(LogLevels.Warn, "m")).toBe(true)
    expect(sampler.allow(LogLevels.Info, "m")).toBe(false)
  })

  it("with 100/100 admits 101 of 250 identical records", () => {
    const sampler = new Sampler({ tickMs: 1000, initial: 100, thereafter: 100 }, clock)

    expect(admitted(sampler, 250)).toBe(101)
  })
})
