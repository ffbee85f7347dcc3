/**
 * Price statistics over integer cents.
 */

export interface PriceStats {
  count: number
  minCents: number
  maxCents: number
  medianCents: number
  meanCents: number
  /** Lower quartile, nearest rank */
  p25Cents: number
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  const upper = sorted[mid] ?? Number.NaN
  if (sorted.length % 2 === 1) return upper
  const lower = sorted[mid - 1] ?? Number.NaN
  return (lower + upper) / 2
}

/**
 * Value at index floor(n * p) of the sorted values.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return Number.NaN
  const sorted = [...values].sort((a, b) => a - b)
  const index = Math.min(sorted.length - 1, Math.max(0, Math.floor(sorted.length * p)))
  return sorted[index] ?? Number.NaN
}

export function computePriceStats(pricesCents: readonly number[]): PriceStats | null {
  if (pricesCents.length === 0) return null
  const total = pricesCents.reduce((sum, value) => sum + value, 0)
  return {
    count: pricesCents.length,
    minCents: Math.min(...pricesCents),
    maxCents: Math.max(...pricesCents),
    medianCents: median(pricesCents),
    meanCents: Math.round(total / pricesCents.length),
    p25Cents: percentile(pricesCents, 0.25),
  }
}

/** Decimal amount into integer cents */
export function toCents(amount: number): number {
  return Math.round(amount * 100)
}

/** 45050 -> "450.50" */
export function formatCents(cents: number): string {
  return (cents / 100).toFixed(2)
}
