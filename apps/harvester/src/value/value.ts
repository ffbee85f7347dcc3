/**
 * Value ranking
 *
 * Benchmark score per currency unit at the best (lowest) kept price.
 * Models without a catalogued score are left out of the ranking.
 */

import type { CatalogStore } from '../catalog/catalog-store.js'
import { computePriceStats, type PriceStats } from '../filters/stats.js'
import type { ObservationsByModel } from '../filters/types.js'

export interface ValueEntry {
  model: string
  benchmarkScore: number
  bestPriceCents: number
  medianPriceCents: number
  listings: number
  /** benchmarkScore / best price in currency units, 3 decimals */
  valuePerUnit: number
}

export function modelPriceStats(observations: ObservationsByModel): Map<string, PriceStats> {
  const result = new Map<string, PriceStats>()
  for (const [model, list] of observations) {
    const stats = computePriceStats(list.map((observation) => observation.priceCents))
    if (stats) result.set(model, stats)
  }
  return result
}

export function rankByValue(observations: ObservationsByModel, catalog: CatalogStore): ValueEntry[] {
  const entries: ValueEntry[] = []

  for (const [model, stats] of modelPriceStats(observations)) {
    const benchmarkScore = catalog.benchmarkScore(model)
    if (benchmarkScore === undefined || benchmarkScore <= 0 || stats.minCents <= 0) continue

    entries.push({
      model,
      benchmarkScore,
      bestPriceCents: stats.minCents,
      medianPriceCents: stats.medianCents,
      listings: stats.count,
      valuePerUnit: Math.round((benchmarkScore / (stats.minCents / 100)) * 1000) / 1000,
    })
  }

  return entries.sort((a, b) => b.valuePerUnit - a.valuePerUnit || a.bestPriceCents - b.bestPriceCents)
}
