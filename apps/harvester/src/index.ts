/**
 * Library entry: everything needed to run an ingest pass programmatically.
 */

export * from './errors.js'

export { CatalogStore, DEFAULT_CATALOG_PATH, DEFAULT_CORRECTIONS_PATH } from './catalog/catalog-store.js'
export type { CatalogLoadOptions } from './catalog/catalog-store.js'
export type { CatalogEntry, CorrectionTable } from './catalog/types.js'
export { splitModelKey, withVram } from './catalog/model-key.js'

export { loadSettings, buildSearchUrl } from './config/settings.js'
export type { HarvesterSettings } from './config/settings.js'

export { ModelExtractor, isImplausibleVram } from './extractor/model-extractor.js'
export type { ExtractionResult, ExtractionRejectReason } from './extractor/model-extractor.js'
export { normalizeModelName } from './extractor/normalize.js'
export { extractVram } from './extractor/vram.js'
export { ModelValidator, isLikelyTypo } from './validation/model-validator.js'
export type { ValidationOutcome, ValidationRejectReason } from './validation/model-validator.js'

export { StatisticalFilter } from './filters/statistical-filter.js'
export { KeywordMatcher, loadFilterKeywords, parseFilterKeywords } from './filters/keywords.js'
export type { FilterKeywords } from './filters/keywords.js'
export { DEFAULT_FILTER_CONFIG } from './filters/types.js'
export type {
  FilterConfig,
  FilterResult,
  FilterStats,
  ObservationsByModel,
  PriceObservation,
} from './filters/types.js'
export { computePriceStats, formatCents, toCents } from './filters/stats.js'

export { RejectionTracker } from './rejections/tracker.js'
export type { RejectionRecord, RejectionSummaryEntry } from './rejections/tracker.js'
export { REJECTION_CATEGORIES, REJECTION_LABELS } from './rejections/categories.js'
export type { RejectionCategory, RejectionStage } from './rejections/categories.js'

export { IngestRun } from './pipeline/orchestrator.js'
export type { IngestRunConfig, IngestRunDeps, IngestRunResult, IngestMetrics } from './pipeline/types.js'

export { HttpFetcher, undiciHttpClient } from './scraper/fetch/http-fetcher.js'
export { SlidingWindowRateLimiter, RedisRateLimiter } from './scraper/fetch/rate-limiter.js'
export { ProxyRotator } from './scraper/fetch/proxy.js'
export { RelayControlClient } from './scraper/fetch/identity-renewer.js'
export { checkConnectivity } from './scraper/fetch/connectivity.js'
export type { ConnectivityReport } from './scraper/fetch/connectivity.js'
export { SelectorListingParser } from './scraper/parse/listing-page.js'
export type { ListingSelectors } from './scraper/parse/listing-page.js'
export { RunDeduper, RedisRunDeduper } from './scraper/process/run-dedupe.js'
export type { Deduper } from './scraper/process/run-dedupe.js'
export { DEFAULT_RATE_LIMIT, DEFAULT_RETRY_POLICY, computeBackoffDelay, systemClock } from './scraper/types.js'
export type {
  Clock,
  Fetcher,
  FetchResult,
  ListingPage,
  ListingPageParser,
  ProxyConfig,
  RateLimitConfig,
  RateLimiter,
  RawAd,
  RetryPolicy,
} from './scraper/types.js'

export { rankByValue } from './value/value.js'
export type { ValueEntry } from './value/value.js'
