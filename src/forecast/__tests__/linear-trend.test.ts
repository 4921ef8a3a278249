import { describe, it, expect } from 'vitest'
import { fitLinearTrend, predict } from '../linear-trend.js'

describe('fitLinearTrend', () => {
  it('fits an exact line', () => {
    const trend = fitLinearTrend([
      { x: 1, y: 100 },
      { x: 2, y: 120 },
      { x: 3, y: 140 },
    ])

    expect(trend).toEqual({ slope: 20, intercept: 80 })
  })

  it('fits a least-squares line through scattered points', () => {
    // mean x = 2.5, mean y = 4; cov = 6, var = 5
    const trend = fitLinearTrend([
      { x: 1, y: 2 },
      { x: 2, y: 3 },
      { x: 3, y: 6 },
      { x: 4, y: 5 },
    ])

    expect(trend.slope).toBeCloseTo(1.2)
    expect(trend.intercept).toBeCloseTo(1)
  })

  it('returns a flat line through the mean when all x are equal', () => {
    const trend = fitLinearTrend([
      { x: 2, y: 10 },
      { x: 2, y: 30 },
    ])

    expect(trend).toEqual({ slope: 0, intercept: 20 })
  })

  it('returns a zero line for no points', () => {
    expect(fitLinearTrend([])).toEqual({ slope: 0, intercept: 0 })
  })
})

describe('predict', () => {
  it('evaluates the line', () => {
    expect(predict({ slope: 20, intercept: 80 }, 4)).toBe(160)
    expect(predict({ slope: -50, intercept: 100 }, 3)).toBe(-50)
  })
})
