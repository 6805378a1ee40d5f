import type { Clock } from '../types'

/** performance.now(): monotonic, sub-microsecond resolution in Node. */
export const monotonicClock: Clock = () => performance.now()

export function elapsedSeconds(startMs: number, endMs: number): number {
  return (endMs - startMs) / 1000
}
