import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { StatAccumulator } from '../statistics/accumulator'

// ─── Shared Arbitraries ─────────────────────────────────────────────────────

// `+ 0` folds -0 into 0 so extrema compare cleanly with toBe
const arbSample = fc
  .double({ min: -1e3, max: 1e3, noNaN: true, noDefaultInfinity: true })
  .map((v) => v + 0)
const arbSamples = fc.array(arbSample, { minLength: 1, maxLength: 60 })
const arbNonFinite = fc.constantFrom(NaN, Infinity, -Infinity)

function twoPass(values: number[]): { mean: number; std: number } {
  const n = values.length
  const mean = values.reduce((a, b) => a + b, 0) / n
  if (n < 2) return { mean, std: 0 }
  const ss = values.reduce((a, v) => a + (v - mean) ** 2, 0)
  return { mean, std: Math.sqrt(ss / (n - 1)) }
}

function fill(acc: StatAccumulator, values: number[]): StatAccumulator {
  for (const v of values) acc.add(v)
  return acc
}

// ─── Examples ───────────────────────────────────────────────────────────────

describe('StatAccumulator', () => {
  it('starts empty', () => {
    const acc = new StatAccumulator()
    expect(acc.name()).toBe('Statistic')
    expect(acc.count()).toBe(0)
    expect(acc.mean()).toBe(0)
    expect(acc.std()).toBe(0)
    expect(acc.variance()).toBe(0)
    expect(acc.last()).toBe(0)
    expect(acc.min()).toBe(Infinity)
    expect(acc.max()).toBe(-Infinity)
    expect(acc.total()).toBe(0)
    expect(acc.cap()).toBeUndefined()
  })

  it('computes count, mean, std, min and max of [1, 2, 3, 4, 5]', () => {
    const acc = fill(new StatAccumulator('five'), [1, 2, 3, 4, 5])
    expect(acc.count()).toBe(5)
    expect(acc.mean()).toBe(3)
    expect(acc.variance()).toBe(2.5)
    expect(acc.std()).toBeCloseTo(1.5811, 4)
    expect(acc.min()).toBe(1)
    expect(acc.max()).toBe(5)
    expect(acc.last()).toBe(5)
    expect(acc.total()).toBe(15)
  })

  it('add returns the updated mean', () => {
    const acc = new StatAccumulator()
    expect(acc.add(4)).toBe(4)
    expect(acc.add(8)).toBe(6)
  })

  it('std is 0 for a single sample', () => {
    const acc = fill(new StatAccumulator(), [42])
    expect(acc.std()).toBe(0)
    expect(acc.mean()).toBe(42)
  })

  it('ignores NaN and infinities and returns NaN', () => {
    const acc = fill(new StatAccumulator(), [2, 4])
    expect(acc.add(NaN)).toBeNaN()
    expect(acc.add(Infinity)).toBeNaN()
    expect(acc.add(-Infinity)).toBeNaN()
    expect(acc.snapshot()).toEqual({
      name: 'Statistic',
      count: 2,
      mean: 3,
      std: Math.SQRT2,
      min: 2,
      max: 4,
      last: 4,
      total: 6,
    })
  })

  it('treats the first finite sample after NaN as the very first', () => {
    const acc = new StatAccumulator()
    acc.add(NaN)
    expect(acc.count()).toBe(0)
    expect(acc.add(10)).toBe(10)
    expect(acc.mean()).toBe(10)
    expect(acc.min()).toBe(10)
    expect(acc.max()).toBe(10)
    expect(acc.count()).toBe(1)
  })

  it('reset restores the virgin state', () => {
    const acc = fill(new StatAccumulator(), [7, -3, 12])
    acc.reset()
    expect(acc.snapshot()).toEqual(new StatAccumulator().snapshot())
  })

  it('rejects caps that are not positive integers', () => {
    expect(() => new StatAccumulator('c', { cap: 0 })).toThrow(RangeError)
    expect(() => new StatAccumulator('c', { cap: -2 })).toThrow(RangeError)
    expect(() => new StatAccumulator('c', { cap: 1.5 })).toThrow('Sample cap must be a positive integer, got 1.5')
  })

  it('weights samples by 1/cap once saturated', () => {
    const acc = new StatAccumulator('capped', { cap: 2 })
    acc.add(0)
    acc.add(0)
    expect(acc.add(10)).toBe(5)
    expect(acc.add(10)).toBe(7.5)
    expect(acc.count()).toBe(2)
    expect(acc.cap()).toBe(2)
    expect(acc.min()).toBe(0)
    expect(acc.max()).toBe(10)
  })

  it('a cap of 1 tracks the latest sample', () => {
    const acc = fill(new StatAccumulator('latest', { cap: 1 }), [3, 9, 4])
    expect(acc.count()).toBe(1)
    expect(acc.mean()).toBe(4)
  })

  it('keeps the mean finite for samples at the edge of the double range', () => {
    const acc = new StatAccumulator()
    expect(acc.add(Number.MAX_VALUE)).toBe(Number.MAX_VALUE)
    expect(acc.add(-Number.MAX_VALUE)).toBe(0)
    expect(acc.count()).toBe(2)
    expect(acc.std()).toBe(Infinity)
    expect(acc.add(3)).toBe(1)
    expect(acc.min()).toBe(-Number.MAX_VALUE)
    expect(acc.max()).toBe(Number.MAX_VALUE)
  })
})

// ─── Properties ─────────────────────────────────────────────────────────────

describe('StatAccumulator — property-based tests', () => {
  it('mean and std match the two-pass computation', () => {
    fc.assert(fc.property(arbSamples, (values) => {
      const acc = fill(new StatAccumulator(), values)
      const expected = twoPass(values)
      expect(acc.count()).toBe(values.length)
      expect(Math.abs(acc.mean() - expected.mean)).toBeLessThanOrEqual(1e-9)
      expect(Math.abs(acc.std() - expected.std)).toBeLessThanOrEqual(1e-7)
    }), { numRuns: 200 })
  })

  it('min and max equal the true extrema', () => {
    fc.assert(fc.property(arbSamples, (values) => {
      const acc = fill(new StatAccumulator(), values)
      expect(acc.min()).toBe(Math.min(...values))
      expect(acc.max()).toBe(Math.max(...values))
      expect(acc.min()).toBeLessThanOrEqual(acc.max())
    }), { numRuns: 200 })
  })

  it('non-finite samples never change any statistic', () => {
    fc.assert(fc.property(arbSamples, arbNonFinite, (values, bad) => {
      const acc = fill(new StatAccumulator(), values)
      const before = acc.snapshot()
      acc.add(bad)
      expect(acc.snapshot()).toEqual(before)
    }), { numRuns: 100 })
  })

  it('reset then add equals fresh then add', () => {
    fc.assert(fc.property(arbSamples, arbSample, (values, x) => {
      const reused = fill(new StatAccumulator(), values)
      reused.reset()
      reused.add(x)
      const fresh = new StatAccumulator()
      fresh.add(x)
      expect(reused.snapshot()).toEqual(fresh.snapshot())
    }), { numRuns: 100 })
  })

  it('count never exceeds the cap', () => {
    fc.assert(fc.property(arbSamples, fc.integer({ min: 1, max: 20 }), (values, cap) => {
      const acc = new StatAccumulator('capped', { cap })
      for (const v of values) {
        acc.add(v)
        expect(acc.count()).toBeLessThanOrEqual(cap)
      }
      expect(acc.count()).toBe(Math.min(values.length, cap))
    }), { numRuns: 100 })
  })
})
