/**
 * Filter types
 */

import type { KeywordCategory } from '../rejections/categories.js'
import type { RejectionRecord } from '../rejections/tracker.js'

/**
 * One accepted listing, attributed to a catalog model.
 * Created after validation, never mutated.
 */
export interface PriceObservation {
  model: string
  priceCents: number
  url: string
  title: string
  description: string
}

export type ObservationsByModel = Map<string, PriceObservation[]>

export interface FilterConfig {
  /** Low threshold = median * lowFactor */
  lowFactor: number
  /** High threshold = median * highFactor */
  highFactor: number
  highEnabled: boolean
  /** Fewer survivors than this: no statistical filtering for the model */
  minSampleSize: number
  /** Prices below this are rejected whatever the model */
  absoluteFloorCents: number
}

export const DEFAULT_FILTER_CONFIG: FilterConfig = {
  lowFactor: 0.5,
  highFactor: 3.0,
  highEnabled: true,
  minSampleSize: 3,
  absoluteFloorCents: 5_000,
}

export type FilterCategory = KeywordCategory | 'STATISTICAL_OUTLIER_LOW' | 'STATISTICAL_OUTLIER_HIGH' | 'EXTREMELY_LOW_PRICE'

export interface FilterStats {
  totalInput: number
  totalKept: number
  totalFiltered: number
  byCategory: Record<FilterCategory, number>
}

export interface ModelThresholds {
  model: string
  /** Observations left after keyword screening */
  sampleSize: number
  /** null when the model is below the minimum sample size */
  medianCents: number | null
  lowCents: number | null
  highCents: number | null
}

export interface FilterResult {
  kept: ObservationsByModel
  stats: FilterStats
  rejected: RejectionRecord[]
  thresholds: ModelThresholds[]
}
