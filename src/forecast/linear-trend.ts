import type { LinearTrend } from './types.js'

export interface TrendPoint {
  x: number
  y: number
}

/**
 * Ordinary least squares over (x, y) pairs, in closed form:
 * slope = cov(x, y) / var(x), intercept = mean(y) - slope · mean(x).
 * When every x is equal the slope is 0 and the line is the mean of y.
 */
export const fitLinearTrend = (points: readonly TrendPoint[]): LinearTrend => {
  const count = points.length
  if (count === 0) {
    return { slope: 0, intercept: 0 }
  }

  let sumX = 0
  let sumY = 0
  for (const point of points) {
    sumX += point.x
    sumY += point.y
  }
  const meanX = sumX / count
  const meanY = sumY / count

  let covariance = 0
  let variance = 0
  for (const point of points) {
    covariance += (point.x - meanX) * (point.y - meanY)
    variance += (point.x - meanX) * (point.x - meanX)
  }

  const slope = variance === 0 ? 0 : covariance / variance
  return { slope, intercept: meanY - slope * meanX }
}

export const predict = (trend: LinearTrend, x: number): number => trend.slope * x + trend.intercept
