/**
 * Text reports for timer trees and single accumulators.
 *
 * The tree report is a depth-first, pre-order walk. Each nested line is
 * prefixed with "| " per ancestor level plus "|-", and the name column
 * shrinks by the same two characters so the numeric columns stay aligned.
 * Durations are stored in seconds; totals print in seconds, the rest in ms.
 */

import type { StatisticsView, TimerView } from '../types'
import { formatSignificant } from './format'

// ─── Layout ──────────────────────────────────────────────────────────────────

export const NAME_WIDTH = 30
export const NAME_WIDTH_STEP = 2
export const STATISTIC_NAME_WIDTH = 16

const NUMBER_WIDTH = 8
const PERCENT_WIDTH = 3

// ─── Helpers ─────────────────────────────────────────────────────────────────

const right = (value: number, width = NUMBER_WIDTH): string =>
  formatSignificant(value).padStart(width)

const left = (value: number, width = NUMBER_WIDTH): string =>
  formatSignificant(value).padEnd(width)

/**
 * Share of the parent's total as a rounded percentage, or null when the
 * parent total is zero.
 */
export function percentOfParent(total: number, parentTotal: number): number | null {
  if (parentTotal === 0) return null
  return Math.round((100 * total) / parentTotal)
}

// ─── Tree report ─────────────────────────────────────────────────────────────

export function renderTimerReport(node: TimerView, level = 0, parentTotal = 0): string {
  const nameWidth = Math.max(0, NAME_WIDTH - NAME_WIDTH_STEP * level)
  const name = node.name().padEnd(nameWidth)

  if (node.count() < 1) return `${name}has no sample yet.\n`

  const total = node.total()
  const percent = percentOfParent(total, parentTotal)

  let line = name
  line += `${right(total)}s  `
  line += percent === null ? ' '.repeat(PERCENT_WIDTH + 2) : `${String(percent).padStart(PERCENT_WIDTH)}% `
  line += `${String(node.count()).padStart(NUMBER_WIDTH)}  calls   mean|std: `
  line += `${right(1000 * node.mean())} | ${left(1000 * node.std())}`
  line += `  [min|max:  ${right(1000 * node.min())} | ${left(1000 * node.max())}] in ms\n`

  const indent = '| '.repeat(level)
  for (const child of node.children()) {
    line += `${indent}|-${renderTimerReport(child, level + 1, total)}`
  }
  return line
}

// ─── Single statistic ────────────────────────────────────────────────────────

export function renderStatistic(stat: StatisticsView): string {
  if (stat.count() < 1) return `${stat.name()} has no sample yet!\n`

  const col = (value: number) => formatSignificant(value).padEnd(5)
  return (
    `${stat.name().padEnd(STATISTIC_NAME_WIDTH)}mean|std  ${col(stat.mean())}|${col(stat.std())}` +
    `  [min|max:  ${col(stat.min())}|${col(stat.max())}]\n`
  )
}
