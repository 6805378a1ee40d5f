/**
 * Name-tagged line logger.
 *
 * Every line starts with a "[name] " tag padded to a fixed width. Colored
 * output marks the level with an ANSI color; uncolored output spells the
 * level out after the tag. write() is the bare "tag + text" operation that
 * timer reports are sent through.
 */

import { format } from 'node:util'
import pc from 'picocolors'
import type { Env } from '@lapstat/config'
import { selectDebugSink, type DebugSink } from './debug-sink'
import { LoggerFatalError } from './errors'
import { loggerSettingsSchema, resolveLoggerSettings, type LoggerSettings, type LoggerSettingsInput } from './settings'
import { stdoutWriter, type TextWriter } from './writers'

// ─── Levels ──────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

const LEVELS: Record<LogLevel, { prefix: string; color: 'yellow' | 'red' | null }> = {
  debug: { prefix: '', color: null },
  info: { prefix: 'Info:    ', color: null },
  warn: { prefix: 'Warning: ', color: 'yellow' },
  error: { prefix: 'Error:   ', color: 'red' },
  fatal: { prefix: 'Fatal:   ', color: 'red' },
}

// ─── Options ─────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Defaults to stdout. */
  readonly out?: TextWriter
  /** Wall-clock milliseconds for timestamps. Defaults to Date.now. */
  readonly now?: () => number
  /** Environment consulted for settings defaults. */
  readonly env?: Env
}

/** "[name] " right-padded with spaces to `padding`; empty for an empty name. */
export function padName(name: string, padding: number): string {
  if (name === '') return ''
  return `[${name}] `.padEnd(padding)
}

function clockTime(ms: number): string {
  const d = new Date(ms)
  return [d.getHours(), d.getMinutes(), d.getSeconds()]
    .map((n) => String(n).padStart(2, '0'))
    .join(':')
}

// ─── Logger ──────────────────────────────────────────────────────────────────

export class Logger {
  private current: LoggerSettings
  private readonly tagText: string
  private readonly out: TextWriter
  private readonly now: () => number
  private readonly createdAt: number
  private colors: ReturnType<typeof pc.createColors>
  private readonly debugSink: DebugSink

  constructor(readonly name: string, settings: LoggerSettingsInput = {}, options: LoggerOptions = {}) {
    this.current = resolveLoggerSettings(settings, options.env)
    this.tagText = padName(name, this.settings.namePadding)
    this.out = options.out ?? stdoutWriter
    this.now = options.now ?? Date.now
    this.createdAt = this.now()
    this.colors = pc.createColors(this.settings.colored)
    this.debugSink = selectDebugSink(this.settings.debug, (line) => this.print('debug', line))
  }

  get settings(): Readonly<LoggerSettings> {
    return this.current
  }

  tag(): string {
    return this.tagText
  }

  // ── Runtime toggles ──

  color(enabled = true): void {
    this.current = { ...this.current, colored: enabled }
    this.colors = pc.createColors(enabled)
  }

  /** Fraction digits for write(). Throws a ZodError outside 0..100. */
  precision(digits: number): void {
    this.current = { ...this.current, precision: loggerSettingsSchema.shape.precision.parse(digits) }
  }

  scientific(enabled = true): void {
    this.current = { ...this.current, scientific: enabled }
  }

  // ── Levels ──

  info(message: string, ...args: unknown[]): void {
    this.print('info', format(message, ...args))
  }

  warn(message: string, ...args: unknown[]): void {
    this.print('warn', format(message, ...args))
  }

  error(message: string, ...args: unknown[]): void {
    this.print('error', format(message, ...args))
  }

  /** Log, then throw a LoggerFatalError. */
  fatal(message: string, ...args: unknown[]): never {
    const text = format(message, ...args)
    this.print('fatal', text)
    throw new LoggerFatalError(this.name, text)
  }

  // ── Debug ──

  debug(message: string, ...args: unknown[]): void {
    this.debugSink.log(message, args)
  }

  /** Run fn only when debug output is enabled. */
  debugRun(fn: () => void): void {
    this.debugSink.run(fn)
  }

  debugEnabled(): boolean {
    return this.debugSink.enabled
  }

  // ── Raw output ──

  /** Tag followed by the value, no newline. Integers print as-is. */
  write(value: unknown): void {
    this.out.write(this.tagText + this.formatValue(value))
  }

  newline(n = 1): void {
    this.out.write('\n'.repeat(n))
  }

  formatValue(value: unknown): string {
    if (typeof value !== 'number' || Number.isInteger(value) || !Number.isFinite(value)) {
      return String(value)
    }
    const { precision, scientific } = this.settings
    return scientific ? value.toExponential(precision) : value.toFixed(precision)
  }

  // ── Internals ──

  private timestamp(): string {
    if (!this.settings.timed) return ''
    const now = this.now()
    if (this.settings.relativeTime) {
      return `${Math.floor((now - this.createdAt) / 1000)}s  `
    }
    return `${clockTime(now)}  `
  }

  private print(level: LogLevel, message: string): void {
    const { prefix, color } = LEVELS[level]
    let line = this.tagText
    if (!this.settings.colored) line += prefix
    line += this.timestamp()
    line += message
    this.out.write(`${color === null ? line : this.colors[color](line)}\n`)
  }
}
