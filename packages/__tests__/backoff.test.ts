import { describe, it, expect } from 'vitest'
import { computeBackoff } from '@huddle/sync'

const middle = () => 0.5

describe('computeBackoff', () => {
  it('doubles from the initial delay', () => {
    expect([1, 2, 3].map((attempt) => computeBackoff(attempt, {}, middle))).toEqual([1000, 2000, 4000])
  })

  it('caps at the maximum delay', () => {
    expect(computeBackoff(10, {}, middle)).toBe(30000)
  })

  it('spreads each delay by the jitter factor', () => {
    expect(computeBackoff(1, {}, () => 0)).toBe(750)
    expect(computeBackoff(1, {}, () => 1)).toBe(1250)
  })

  it('accepts custom bounds', () => {
    expect(computeBackoff(4, { initialDelay: 100, maxDelay: 500, jitter: 0 })).toBe(500)
    expect(computeBackoff(2, { initialDelay: 100, maxDelay: 500, jitter: 0 })).toBe(200)
  })

  it('treats attempts below one as the first retry', () => {
    expect(computeBackoff(0, {}, middle)).toBe(1000)
  })
})
