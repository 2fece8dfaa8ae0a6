import type { Clock } from "../ports/clock"

export type SamplingPolicy = {
  tickMs: number
  /** Records per tick logged unconditionally. */
  initial: number
  /** After `initial`, every Nth record is logged. 0 drops the rest. */
  thereafter: number
}

type Counter = {
  resetAt: number
  count: number
}

const BUCKETS_PER_LEVEL = 4096

function fnv32a(value: string): number {
  let hash = 0x811c9dc5

  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i)
    hash = Math.imul(hash, 0x01000193)
  }

  return hash >>> 0
}

/**
 * Caps repeated records. Records are classified by level and a hash of their
 * message; within one tick a class admits its first `initial` records and then
 * every `thereafter`-th.
 *
 * Distinct messages can share a bucket, in which case they share a budget.
 */
export class Sampler {
  private readonly counters = new Map<number, Counter>()

  constructor(
    private readonly policy: SamplingPolicy,
    private readonly clock: Clock,
  ) {}

  allow(level: number, message: string): boolean {
    const key = level * BUCKETS_PER_LEVEL + (fnv32a(message) % BUCKETS_PER_LEVEL)
    const now = this.clock.now().getTime()

    let counter = this.counters.get(key)

    if (!counter || now >= counter.resetAt) {
      counter = { resetAt: now + this.policy.tickMs, count: 0 }
      this.counters.set(key, counter)
    }

    counter.count += 1

    const { initial, thereafter } = this.policy

    if (counter.count <= initial) return true

    return thereafter > 0 && (counter.count - initial) % thereafter === 0
  }
}
