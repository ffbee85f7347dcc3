/**
 * Rejection categories
 *
 * Every listing dropped during a run lands in exactly one category.
 */

export const REJECTION_CATEGORIES = [
  'MINING',
  'WATER_COOLING_PARTS',
  'COOLING_PARTS',
  'DEFECTIVE',
  'FULL_COMPUTER',
  'STATISTICAL_OUTLIER_LOW',
  'STATISTICAL_OUTLIER_HIGH',
  'EXTREMELY_LOW_PRICE',
  'INVALID_PRICE',
  'NO_MODEL',
  'INVALID_VRAM',
  'MISSING_VRAM',
  'LIKELY_TYPO',
  'UNKNOWN_MODEL',
] as const

export type RejectionCategory = (typeof REJECTION_CATEGORIES)[number]

export const REJECTION_LABELS: Record<RejectionCategory, string> = {
  MINING: 'Mining card',
  WATER_COOLING_PARTS: 'Water cooling parts',
  COOLING_PARTS: 'Cooling parts',
  DEFECTIVE: 'Defective or for parts',
  FULL_COMPUTER: 'Full computer or laptop',
  STATISTICAL_OUTLIER_LOW: 'Statistical outlier (too low)',
  STATISTICAL_OUTLIER_HIGH: 'Statistical outlier (too high)',
  EXTREMELY_LOW_PRICE: 'Extremely low price',
  INVALID_PRICE: 'Missing or invalid price',
  NO_MODEL: 'No GPU model found',
  INVALID_VRAM: 'Invalid VRAM',
  MISSING_VRAM: 'Missing VRAM',
  LIKELY_TYPO: 'Invalid GPU model (typo)',
  UNKNOWN_MODEL: 'Unknown GPU model',
}

/** Keyword categories in the order they are checked */
export const KEYWORD_CATEGORIES = ['MINING', 'WATER_COOLING_PARTS', 'COOLING_PARTS', 'DEFECTIVE', 'FULL_COMPUTER'] as const

export type KeywordCategory = (typeof KEYWORD_CATEGORIES)[number]

/** Where in the run a listing was dropped */
export type RejectionStage = 'price' | 'prescreen' | 'extraction' | 'validation' | 'filter'

