/**
 * Fixed-interval call throttler, e.g. for log lines inside hot loops.
 * The first call always runs; later calls run only once strictly more than
 * the period has passed since the last call that ran.
 */

import { monotonicClock } from '../timer/clock'
import type { Clock } from '../types'

export class Throttler {
  private readonly periodMs: number
  private lastRunMs: number | null = null

  constructor(periodSeconds: number, private readonly clock: Clock = monotonicClock) {
    if (!Number.isFinite(periodSeconds) || periodSeconds < 0) {
      throw new RangeError(`Throttle period must be a non-negative number of seconds, got ${periodSeconds}`)
    }
    this.periodMs = periodSeconds * 1000
  }

  /** Call fn with args if the period has elapsed. Returns whether it ran. */
  run<A extends unknown[]>(fn: (...args: A) => void, ...args: A): boolean {
    const now = this.clock()
    if (this.lastRunMs !== null && now - this.lastRunMs <= this.periodMs) return false
    fn(...args)
    this.lastRunMs = now
    return true
  }

  reset(): void {
    this.lastRunMs = null
  }
}
