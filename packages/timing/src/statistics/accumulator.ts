/**
 * Running statistics over a stream of finite samples.
 *
 * Mean and variance follow Welford's online algorithm, so no history is
 * kept and each sample costs O(1). With a cap, the count saturates and the
 * mean turns into a bounded-influence running average: every sample past
 * the cap moves the mean by (value - mean) / cap.
 */

import type { AccumulatorOptions, AccumulatorSnapshot, StatisticsView } from '../types'

export class StatAccumulator implements StatisticsView {
  private n = 0
  private runningMean = 0
  private m2 = 0
  private lastValue = 0
  private minValue = Infinity
  private maxValue = -Infinity
  private readonly maxCount: number | undefined

  constructor(private readonly label = 'Statistic', options: AccumulatorOptions = {}) {
    const { cap } = options
    if (cap !== undefined && (!Number.isInteger(cap) || cap < 1)) {
      throw new RangeError(`Sample cap must be a positive integer, got ${cap}`)
    }
    this.maxCount = cap
  }

  /**
   * Add a sample and return the updated mean.
   * Non-finite values are ignored and return NaN.
   */
  add(value: number): number {
    if (!Number.isFinite(value)) return NaN

    if (this.maxCount === undefined || this.n < this.maxCount) this.n++

    // stays finite for samples near ±Number.MAX_VALUE
    const meanBefore = this.runningMean
    this.runningMean += value / this.n - meanBefore / this.n
    this.m2 += (value - meanBefore) * (value - this.runningMean)

    this.lastValue = value
    if (value < this.minValue) this.minValue = value
    if (value > this.maxValue) this.maxValue = value

    return this.runningMean
  }

  name(): string {
    return this.label
  }

  count(): number {
    return this.n
  }

  cap(): number | undefined {
    return this.maxCount
  }

  /** 0 before the first sample; check count() first. */
  mean(): number {
    return this.runningMean
  }

  /** Sample (Bessel-corrected) variance, 0 for fewer than two samples. */
  variance(): number {
    return this.n > 1 ? this.m2 / (this.n - 1) : 0
  }

  std(): number {
    return Math.sqrt(this.variance())
  }

  min(): number {
    return this.minValue
  }

  max(): number {
    return this.maxValue
  }

  last(): number {
    return this.lastValue
  }

  total(): number {
    return this.runningMean * this.n
  }

  snapshot(): AccumulatorSnapshot {
    return {
      name: this.label,
      count: this.n,
      mean: this.runningMean,
      std: this.std(),
      min: this.minValue,
      max: this.maxValue,
      last: this.lastValue,
      total: this.total(),
    }
  }

  reset(): void {
    this.n = 0
    this.runningMean = 0
    this.m2 = 0
    this.lastValue = 0
    this.minValue = Infinity
    this.maxValue = -Infinity
  }
}
