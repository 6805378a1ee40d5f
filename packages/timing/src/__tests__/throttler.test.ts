import { describe, it, expect, vi } from 'vitest'
import { Throttler } from '../throttle/throttler'

describe('Throttler', () => {
  it('runs the first call and then at most once per period', () => {
    let time = 0
    const throttler = new Throttler(1, () => time)
    const fn = vi.fn()

    expect(throttler.run(fn, 'a')).toBe(true)
    time = 500
    expect(throttler.run(fn, 'b')).toBe(false)
    time = 1000
    expect(throttler.run(fn, 'c')).toBe(false) // not strictly more than the period
    time = 1001
    expect(throttler.run(fn, 'd')).toBe(true)

    expect(fn).toHaveBeenCalledTimes(2)
    expect(fn.mock.calls).toEqual([['a'], ['d']])
  })

  it('measures the period from the last call that ran', () => {
    let time = 0
    const throttler = new Throttler(0.1, () => time)
    const seen: number[] = []
    for (time = 0; time <= 500; time += 30) {
      throttler.run((t: number) => { seen.push(t) }, time)
    }
    expect(seen).toEqual([0, 120, 240, 360, 480])
  })

  it('reset lets the next call through', () => {
    let time = 0
    const throttler = new Throttler(10, () => time)
    const fn = vi.fn()
    throttler.run(fn)
    time = 1
    throttler.reset()
    expect(throttler.run(fn)).toBe(true)
    expect(fn).toHaveBeenCalledTimes(2)
  })

  it('rejects invalid periods', () => {
    expect(() => new Throttler(-1)).toThrow(RangeError)
    expect(() => new Throttler(NaN)).toThrow('Throttle period must be a non-negative number of seconds, got NaN')
  })
})
