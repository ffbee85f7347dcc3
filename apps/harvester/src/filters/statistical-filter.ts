/**
 * Statistical Filter
 *
 * Post-processing pass over everything a run collected. Statistics are
 * computed per model on the complete data set, so there is no warm-up phase.
 *
 * Per model, first match wins for each observation:
 * 1. Keyword categories (mining, water cooling, cooling parts, defective, full computer)
 * 2. Minimum-sample gate: small models skip steps 3 and 4
 * 3. Low outlier: below median * lowFactor AND urgency/promo wording
 * 4. High outlier: above median * highFactor (toggle)
 * 5. Absolute floor
 */

import { loggers } from '../config/logger.js'
import type { KeywordCategory } from '../rejections/categories.js'
import { KEYWORD_CATEGORIES, REJECTION_LABELS } from '../rejections/categories.js'
import { RejectionTracker } from '../rejections/tracker.js'
import type { FilterKeywords } from './keywords.js'
import { CATEGORY_KEYWORD_KEYS, KeywordMatcher } from './keywords.js'
import { formatCents, median } from './stats.js'
import type {
  FilterCategory,
  FilterConfig,
  FilterResult,
  FilterStats,
  ModelThresholds,
  ObservationsByModel,
  PriceObservation,
} from './types.js'
import { DEFAULT_FILTER_CONFIG } from './types.js'

const log = loggers.filters

function emptyStats(): FilterStats {
  return {
    totalInput: 0,
    totalKept: 0,
    totalFiltered: 0,
    byCategory: {
      MINING: 0,
      WATER_COOLING_PARTS: 0,
      COOLING_PARTS: 0,
      DEFECTIVE: 0,
      FULL_COMPUTER: 0,
      STATISTICAL_OUTLIER_LOW: 0,
      STATISTICAL_OUTLIER_HIGH: 0,
      EXTREMELY_LOW_PRICE: 0,
    },
  }
}

function listingText(observation: PriceObservation): string {
  return `${observation.title} ${observation.description}`
}

function percent(factor: number): string {
  return `${Math.round(factor * 100)}%`
}

export class StatisticalFilter {
  private readonly config: FilterConfig
  private readonly categoryMatchers: Array<{ category: KeywordCategory; matcher: KeywordMatcher }>
  private readonly suspiciousMatcher: KeywordMatcher

  constructor(keywords: FilterKeywords, config: Partial<FilterConfig> = {}) {
    this.config = { ...DEFAULT_FILTER_CONFIG, ...config }
    this.categoryMatchers = KEYWORD_CATEGORIES.map((category) => ({
      category,
      matcher: new KeywordMatcher(keywords[CATEGORY_KEYWORD_KEYS[category]]),
    }))
    this.suspiciousMatcher = new KeywordMatcher(keywords.suspicious)
  }

  /**
   * First keyword category the listing text falls into, if any.
   * Also used by the pipeline to pre-screen full computers before extraction.
   */
  keywordCategory(text: string): { category: KeywordCategory; keyword: string } | null {
    for (const { category, matcher } of this.categoryMatchers) {
      const keyword = matcher.find(text)
      if (keyword !== null) return { category, keyword }
    }
    return null
  }

  filter(observationsByModel: ObservationsByModel): FilterResult {
    const tracker = new RejectionTracker()
    const stats = emptyStats()
    const kept: ObservationsByModel = new Map()
    const thresholds: ModelThresholds[] = []

    const reject = (observation: PriceObservation, category: FilterCategory, reason: string): void => {
      tracker.record({
        title: observation.title,
        priceCents: observation.priceCents,
        url: observation.url,
        model: observation.model,
        reason,
        category,
        stage: 'filter',
      })
      stats.byCategory[category] += 1
      stats.totalFiltered += 1
    }

    for (const [model, observations] of observationsByModel) {
      stats.totalInput += observations.length

      const survivors: PriceObservation[] = []
      for (const observation of observations) {
        const match = this.keywordCategory(listingText(observation))
        if (match) {
          reject(observation, match.category, `Contains ${REJECTION_LABELS[match.category].toLowerCase()} keyword: "${match.keyword}"`)
        } else {
          survivors.push(observation)
        }
      }

      const limits = this.thresholdsFor(model, survivors)
      thresholds.push(limits)

      const keptForModel: PriceObservation[] = []
      for (const observation of survivors) {
        const price = observation.priceCents

        if (limits.lowCents !== null && limits.medianCents !== null && price < limits.lowCents) {
          const keyword = this.suspiciousMatcher.find(listingText(observation))
          if (keyword !== null) {
            reject(
              observation,
              'STATISTICAL_OUTLIER_LOW',
              `Statistical outlier: ${formatCents(price)} < ${formatCents(limits.lowCents)} ` +
                `(${percent(this.config.lowFactor)} of median ${formatCents(limits.medianCents)}) with "${keyword}"`
            )
            continue
          }
        }

        if (limits.highCents !== null && limits.medianCents !== null && price > limits.highCents) {
          reject(
            observation,
            'STATISTICAL_OUTLIER_HIGH',
            `Price too high: ${formatCents(price)} > ${formatCents(limits.highCents)} ` +
              `(${percent(this.config.highFactor)} of median ${formatCents(limits.medianCents)})`
          )
          continue
        }

        if (price < this.config.absoluteFloorCents) {
          reject(
            observation,
            'EXTREMELY_LOW_PRICE',
            `Extremely low price: ${formatCents(price)} < ${formatCents(this.config.absoluteFloorCents)}`
          )
          continue
        }

        keptForModel.push(observation)
      }

      stats.totalKept += keptForModel.length
      if (keptForModel.length > 0) kept.set(model, keptForModel)
    }

    log.info('Filtering complete', {
      models: observationsByModel.size,
      totalInput: stats.totalInput,
      totalKept: stats.totalKept,
      totalFiltered: stats.totalFiltered,
    })

    return { kept, stats, rejected: [...tracker.records()], thresholds }
  }

  /**
   * Per-model median and thresholds as the filter would apply them,
   * one line per model, for logging before the pass.
   */
  summarizeThresholds(observationsByModel: ObservationsByModel): string[] {
    const lines: string[] = []
    for (const [model, observations] of observationsByModel) {
      const survivors = observations.filter((observation) => this.keywordCategory(listingText(observation)) === null)
      lines.push(describeThresholds(this.thresholdsFor(model, survivors)))
    }
    return lines
  }

  private thresholdsFor(model: string, survivors: readonly PriceObservation[]): ModelThresholds {
    if (survivors.length < this.config.minSampleSize) {
      return { model, sampleSize: survivors.length, medianCents: null, lowCents: null, highCents: null }
    }
    const medianCents = median(survivors.map((observation) => observation.priceCents))
    return {
      model,
      sampleSize: survivors.length,
      medianCents,
      lowCents: medianCents * this.config.lowFactor,
      highCents: this.config.highEnabled ? medianCents * this.config.highFactor : null,
    }
  }
}

export function describeThresholds(limits: ModelThresholds): string {
  if (limits.medianCents === null) {
    return `${limits.model}: no filtering (${limits.sampleSize} listings)`
  }
  const low = limits.lowCents === null ? 'off' : formatCents(limits.lowCents)
  const high = limits.highCents === null ? 'off' : formatCents(limits.highCents)
  return `${limits.model}: median ${formatCents(limits.medianCents)}, low ${low}, high ${high} (${limits.sampleSize} listings)`
}
