import type { Clock, Milliseconds } from "../../ports/clock"

/** A clock that only moves when told to. */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
