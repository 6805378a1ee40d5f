/**
 * Scoped timing: start on entry, stop on every exit path.
 *
 * scoped() owns a fresh timer and writes its report when the scope ends;
 * ticToc() drives an existing timer and prints nothing. Errors thrown by
 * the wrapped function propagate unchanged after the timer is stopped.
 */

import type { LineSink, TimerOptions } from '../types'
import { TimerNode, stdoutSink } from './timer-node'

export interface ScopedOptions extends TimerOptions {
  /** Where the report goes when the scope ends. Defaults to stdout. */
  readonly sink?: LineSink
}

export function scoped<T>(name: string, fn: (timer: TimerNode) => T, options: ScopedOptions = {}): T {
  const timer = new TimerNode(name, options)
  timer.start()
  try {
    return fn(timer)
  } finally {
    timer.stop()
    timer.print(options.sink ?? stdoutSink)
  }
}

export async function scopedAsync<T>(
  name: string,
  fn: (timer: TimerNode) => Promise<T>,
  options: ScopedOptions = {},
): Promise<T> {
  const timer = new TimerNode(name, options)
  timer.start()
  try {
    return await fn(timer)
  } finally {
    timer.stop()
    timer.print(options.sink ?? stdoutSink)
  }
}

export function ticToc<T>(timer: TimerNode, fn: () => T): T {
  timer.start()
  try {
    return fn()
  } finally {
    timer.stop()
  }
}

export async function ticTocAsync<T>(timer: TimerNode, fn: () => Promise<T>): Promise<T> {
  timer.start()
  try {
    return await fn()
  } finally {
    timer.stop()
  }
}

// ─── StaticTimer ─────────────────────────────────────────────────────────────

/**
 * A timer that prints its report when the process exits.
 * Meant for module-level timers while hunting down slow code.
 */
export class StaticTimer extends TimerNode {
  private readonly onExit: () => void
  private attached = true

  constructor(name = 'Timer', options: ScopedOptions = {}) {
    super(name, options)
    const sink = options.sink ?? stdoutSink
    this.onExit = () => this.print(sink)
    process.once('exit', this.onExit)
  }

  /** Cancel the exit report. */
  detach(): void {
    if (!this.attached) return
    process.removeListener('exit', this.onExit)
    this.attached = false
  }
}
