/**
 * Ingest run types
 */

import type { CatalogStore } from '../catalog/catalog-store.js'
import type { FilterKeywords } from '../filters/keywords.js'
import type { FilterConfig, FilterStats, ObservationsByModel } from '../filters/types.js'
import type { RejectionRecord, RejectionSummaryEntry } from '../rejections/tracker.js'
import type { ConnectivityReport } from '../scraper/fetch/connectivity.js'
import type { Deduper } from '../scraper/process/run-dedupe.js'
import type { Clock, Fetcher, ListingPageParser } from '../scraper/types.js'

export interface IngestRunConfig {
  searchTerms: string[]
  /** Page bound per term; ignored when allPages is set */
  maxPagesPerTerm: number
  /** Follow pagination until the parser reports no next page */
  allPages: boolean
  buildSearchUrl: (term: string, page: number) => string
  /** A term stops after this many empty or failed pages in a row */
  maxConsecutiveEmptyPages?: number
}

export interface ProgressDetails {
  term?: string
  page?: number
  termIndex?: number
  totalTerms: number
  observations: number
}

/** Scraping spans 0-80 %, filtering 80-100 % */
export type ProgressCallback = (percent: number, status: string, details: ProgressDetails) => void

export interface IngestRunDeps {
  catalog: CatalogStore
  fetcher: Fetcher
  parser: ListingPageParser
  keywords: FilterKeywords
  filterConfig?: Partial<FilterConfig>
  deduper?: Deduper
  /** Run-level precondition; a rejection fails the run before any fetch */
  checkConnectivity?: () => Promise<ConnectivityReport>
  onProgress?: ProgressCallback
  signal?: AbortSignal
  clock?: Clock
  runId?: string
}

export interface IngestMetrics {
  termsProcessed: number
  pagesFetched: number
  pagesFailed: number
  adsSeen: number
  duplicates: number
  /** Listings attributed to a model before statistical filtering */
  accepted: number
  rejectedBeforeFilter: number
  durationMs: number
}

export interface IngestRunResult {
  runId: string
  success: boolean
  /** Cancelled through the abort signal; collected data was still filtered */
  stopped: boolean
  observations: ObservationsByModel
  filterStats: FilterStats | null
  rejections: RejectionRecord[]
  rejectionSummary: RejectionSummaryEntry[]
  metrics: IngestMetrics
  connectivity?: ConnectivityReport
  error?: string
}
