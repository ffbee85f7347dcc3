import { describe, expect, it } from 'vitest'
import type { IngestRunResult } from '../../pipeline/types.js'
import type { ValueEntry } from '../../value/value.js'
import { formatRunReport, toJsonReport } from '../report.js'

const observation = (priceCents: number, id: string) => ({
  model: 'RTX 3060 12GB',
  priceCents,
  url: `https://market.example.bg/ad/${id}`,
  title: 'RTX 3060 12GB',
  description: '',
})

const result: IngestRunResult = {
  runId: 'run-test',
  success: true,
  stopped: false,
  observations: new Map([['RTX 3060 12GB', [observation(80000, 'a1'), observation(90000, 'a2'), observation(85000, 'a3')]]]),
  filterStats: {
    totalInput: 4,
    totalKept: 3,
    totalFiltered: 1,
    byCategory: {
      MINING: 1,
      WATER_COOLING_PARTS: 0,
      COOLING_PARTS: 0,
      DEFECTIVE: 0,
      FULL_COMPUTER: 0,
      STATISTICAL_OUTLIER_LOW: 0,
      STATISTICAL_OUTLIER_HIGH: 0,
      EXTREMELY_LOW_PRICE: 0,
    },
  },
  rejections: [],
  rejectionSummary: [{ category: 'MINING', label: 'Mining card', count: 1 }],
  metrics: {
    termsProcessed: 1,
    pagesFetched: 2,
    pagesFailed: 1,
    adsSeen: 5,
    duplicates: 1,
    accepted: 4,
    rejectedBeforeFilter: 0,
    durationMs: 1200,
  },
}

const ranking: ValueEntry[] = [
  {
    model: 'RTX 3060 12GB',
    benchmarkScore: 58,
    bestPriceCents: 80000,
    medianPriceCents: 85000,
    listings: 3,
    valuePerUnit: 0.073,
  },
]

describe('formatRunReport', () => {
  it('renders totals, per-model prices, rejections and value ranking', () => {
    expect(formatRunReport(result, ranking)).toEqual([
      'Run run-test: completed',
      'Pages: 2 fetched, 1 failed; listings: 5 seen, 1 duplicates',
      'Kept 3 of 4 after filtering',
      '',
      'Models:',
      '  RTX 3060 12GB: 3 listings, min 800.00, median 850.00, max 900.00',
      '',
      'Rejections:',
      '  Mining card: 1',
      '',
      'Best value:',
      '  1. RTX 3060 12GB: 0.073 points per unit at 800.00',
    ])
  })

  it('shows the error of a failed run', () => {
    const failed: IngestRunResult = {
      ...result,
      success: false,
      error: 'No route to the probe endpoint',
      observations: new Map(),
      filterStats: null,
      rejectionSummary: [],
    }
    expect(formatRunReport(failed, []).slice(0, 2)).toEqual([
      'Run run-test: failed',
      'Error: No route to the probe endpoint',
    ])
  })
})

describe('toJsonReport', () => {
  it('turns the observation map into an object', () => {
    const json = toJsonReport(result, ranking)
    expect(Object.keys(json)).toEqual([
      'runId',
      'success',
      'stopped',
      'metrics',
      'filterStats',
      'observations',
      'rejectionSummary',
      'rejections',
      'ranking',
    ])
    expect(JSON.parse(JSON.stringify(json.observations))).toEqual({
      'RTX 3060 12GB': [observation(80000, 'a1'), observation(90000, 'a2'), observation(85000, 'a3')],
    })
  })
})
