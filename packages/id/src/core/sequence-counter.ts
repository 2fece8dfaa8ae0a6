import type { Sequence } from "../ports/sequence"

export class SequenceCounter implements Sequence {
  private value: number

  constructor(start: number = 0) {
    this.value = start
  }

  next(): number {
    this.value += 1
    return this.value
  }

  current(): number {
    return this.value
  }

  /** Tests only: production code never rewinds a sequence. */
  reset(start: number = 0): void {
    this.value = start
  }
}

/** Shared by every request id generated in this process. */
export const processCounter = new SequenceCounter()
