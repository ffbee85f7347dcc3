import { describe, expect, it } from 'vitest'
import { computePriceStats, formatCents, median, percentile, toCents } from '../stats.js'

describe('price statistics', () => {
  it('takes the middle value or the mean of the two middle values', () => {
    expect(median([3, 1, 2])).toBe(2)
    expect(median([4, 1, 3, 2])).toBe(2.5)
    expect(median([])).toBeNaN()
  })

  it('uses the nearest lower rank for percentiles', () => {
    expect(percentile([40, 10, 30, 20], 0.25)).toBe(20)
    expect(percentile([10], 0.25)).toBe(10)
  })

  it('summarizes a price list', () => {
    expect(computePriceStats([10000, 20000, 30000, 40000])).toEqual({
      count: 4,
      minCents: 10000,
      maxCents: 40000,
      medianCents: 25000,
      meanCents: 25000,
      p25Cents: 20000,
    })
    expect(computePriceStats([])).toBeNull()
  })

  it('converts between amounts and cents', () => {
    expect(toCents(450.5)).toBe(45050)
    expect(toCents(19.99)).toBe(1999)
    expect(formatCents(45050)).toBe('450.50')
  })
})
