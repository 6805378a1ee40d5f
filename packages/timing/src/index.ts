// Timing: running statistics, nested timers, reports, and throttling.

export type {
  Clock,
  LineSink,
  AccumulatorOptions,
  AccumulatorSnapshot,
  StatisticsView,
  TimerOptions,
  TimerView,
} from './types'

export { StatAccumulator } from './statistics/accumulator'

export { monotonicClock, elapsedSeconds } from './timer/clock'

export { TimerNode, stdoutSink } from './timer/timer-node'

export {
  scoped,
  scopedAsync,
  ticToc,
  ticTocAsync,
  StaticTimer,
  type ScopedOptions,
} from './timer/scoped'

export {
  renderTimerReport,
  renderStatistic,
  percentOfParent,
  NAME_WIDTH,
  NAME_WIDTH_STEP,
  STATISTIC_NAME_WIDTH,
} from './report/render'

export { formatSignificant } from './report/format'

export { Throttler } from './throttle/throttler'
