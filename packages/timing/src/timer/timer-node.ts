/**
 * Timer with running statistics and nested child timers.
 *
 * start()/stop() pairs feed elapsed seconds into an owned StatAccumulator.
 * stop() also re-arms the timer, so repeated stop() calls act as laps.
 * Children are created only through nest(), which keeps the tree acyclic.
 */

import { StatAccumulator } from '../statistics/accumulator'
import { renderTimerReport } from '../report/render'
import type { AccumulatorSnapshot, Clock, LineSink, TimerOptions, TimerView } from '../types'
import { elapsedSeconds, monotonicClock } from './clock'

export const stdoutSink: LineSink = {
  write: (text) => {
    process.stdout.write(text)
  },
}

export class TimerNode implements TimerView {
  private readonly stats: StatAccumulator
  private readonly nested: TimerNode[] = []
  private readonly clock: Clock
  private readonly cap: number | undefined
  private startMs: number | null = null

  constructor(name = 'Timer', options: TimerOptions = {}) {
    this.stats = new StatAccumulator(name, options)
    this.clock = options.clock ?? monotonicClock
    this.cap = options.cap
  }

  // ── Lifecycle ──

  /** Record the pending start. A second start() replaces the first. */
  start(): void {
    this.startMs = this.clock()
  }

  /**
   * Add the time since the pending start as a sample and re-arm.
   *
   * Returns the accumulator's updated mean, not this call's duration.
   * Without a pending start nothing is recorded and NaN is returned.
   */
  stop(): number {
    if (this.startMs === null) return NaN
    const now = this.clock()
    const dt = elapsedSeconds(this.startMs, now)
    this.startMs = now
    return this.stats.add(dt)
  }

  running(): boolean {
    return this.startMs !== null
  }

  /** Clear the pending start and all statistics. Children are kept. */
  reset(): void {
    this.startMs = null
    this.stats.reset()
  }

  // ── Tree ──

  /** Create a child timer sharing this timer's clock and cap. */
  nest(name: string): TimerNode {
    const child = new TimerNode(name, { clock: this.clock, cap: this.cap })
    this.nested.push(child)
    return child
  }

  children(): readonly TimerNode[] {
    return this.nested
  }

  child(name: string): TimerNode | undefined {
    return this.nested.find((c) => c.name() === name)
  }

  // ── Statistics ──

  name(): string {
    return this.stats.name()
  }

  count(): number {
    return this.stats.count()
  }

  mean(): number {
    return this.stats.mean()
  }

  std(): number {
    return this.stats.std()
  }

  min(): number {
    return this.stats.min()
  }

  max(): number {
    return this.stats.max()
  }

  last(): number {
    return this.stats.last()
  }

  /** Accumulated seconds, mean × count. */
  total(): number {
    return this.stats.total()
  }

  snapshot(): AccumulatorSnapshot {
    return this.stats.snapshot()
  }

  // ── Output ──

  render(): string {
    return renderTimerReport(this)
  }

  toString(): string {
    return this.render()
  }

  print(sink: LineSink = stdoutSink): void {
    sink.write(this.render())
  }
}
