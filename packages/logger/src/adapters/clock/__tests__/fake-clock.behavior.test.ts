import { FakeClock } from "../fake-clock"
import { SystemClock } from "../system-clock"

describe("FakeClock behavior", () => {
  it("starts at the given instant", () => {
    expect(new FakeClock(1_000).now().getTime()).toBe(1_000)
    expect(new FakeClock(new Date(Date.UTC(2024, 0, 1))).now().toISOString()).toBe(
      "2024-01-01T00:00:00.000Z",
    )
  })

  it("moves only when advanced or set", () => {
    const clock = new FakeClock(0)

    clock.advance(250)
    expect(clock.now().getTime()).toBe(250)

    clock.set(10)
    expect(clock.now().getTime()).toBe(10)
  })
})

describe("SystemClock behavior", () => {
  it("reads the current time", () => {
    vi.useFakeTimers({ now: Date.UTC(2024, 1, 29, 12) })

    expect(new SystemClock().now().toISOString()).toBe("2024-02-29T12:00:00.000Z")

    vi.useRealTimers()
  })
})
