/**
 * A monotonically increasing counter.
 *
 * @remarks
 * `next()` MUST return a value strictly greater than every value it returned
 * before, for the lifetime of the instance.
 */
export interface Sequence {
  next(): number
  current(): number
}
