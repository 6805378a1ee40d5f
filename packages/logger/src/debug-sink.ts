/**
 * Debug output, chosen once when a logger is built.
 *
 * Call sites look the same for both sinks. The null sink never formats its
 * arguments and never runs the callback, so disabled debug output costs a
 * single method call.
 */

import { format } from 'node:util'

export interface DebugSink {
  readonly enabled: boolean
  log(message: string, args: readonly unknown[]): void
  run(fn: () => void): void
}

export class ActiveDebugSink implements DebugSink {
  readonly enabled = true

  constructor(private readonly emit: (line: string) => void) {}

  log(message: string, args: readonly unknown[]): void {
    this.emit(format(message, ...args))
  }

  run(fn: () => void): void {
    fn()
  }
}

export const nullDebugSink: DebugSink = {
  enabled: false,
  log: () => undefined,
  run: () => undefined,
}

export function selectDebugSink(enabled: boolean, emit: (line: string) => void): DebugSink {
  return enabled ? new ActiveDebugSink(emit) : nullDebugSink
}
