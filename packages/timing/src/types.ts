/**
 * Shared types for the timing package.
 *
 * Durations handed to accumulators by timers are in seconds; clocks and
 * rendered statistics use milliseconds.
 */

// ─── Collaborators ───────────────────────────────────────────────────────────

/** Monotonic time source in milliseconds. Must never jump backwards. */
export type Clock = () => number

/** Anything that accepts rendered text, e.g. a Logger or a stream adapter. */
export interface LineSink {
  write(text: string): void
}

// ─── Statistics ──────────────────────────────────────────────────────────────

export interface AccumulatorOptions {
  /** Maximum sample count. Once reached, each new sample gets weight 1/cap. */
  readonly cap?: number
}

/** Plain read-only copy of an accumulator's state. */
export interface AccumulatorSnapshot {
  readonly name: string
  readonly count: number
  readonly mean: number
  readonly std: number
  readonly min: number
  readonly max: number
  readonly last: number
  /** mean × count */
  readonly total: number
}

/** Read-only statistics surface shared by accumulators and timers. */
export interface StatisticsView {
  name(): string
  count(): number
  mean(): number
  std(): number
  min(): number
  max(): number
  last(): number
  total(): number
}

// ─── Timers ──────────────────────────────────────────────────────────────────

export interface TimerOptions extends AccumulatorOptions {
  readonly clock?: Clock
}

/** What the report renderer needs from a node of the timer tree. */
export interface TimerView extends StatisticsView {
  children(): readonly TimerView[]
}
