/**
 * Ingest Run
 *
 * One pass over the configured search terms:
 *
 *   terms -> pages -> fetch -> parse -> per ad:
 *     price check -> full-computer pre-screen -> extract -> validate -> dedupe -> accumulate
 *
 * then one statistical filtering pass over everything collected.
 *
 * Terms and pages are processed sequentially. Page failures are skipped;
 * per-listing problems become rejection records. Only run-level
 * preconditions (connectivity) and unexpected errors fail the run.
 */

import { createId } from '@paralleldrive/cuid2'
import type { CatalogStore } from '../catalog/catalog-store.js'
import { loggers } from '../config/logger.js'
import { createRunLogger, sanitizeUrl, type RunLogger } from '../config/structured-log.js'
import { ModelExtractor } from '../extractor/model-extractor.js'
import { KeywordMatcher } from '../filters/keywords.js'
import { toCents } from '../filters/stats.js'
import { StatisticalFilter } from '../filters/statistical-filter.js'
import type { FilterResult, FilterStats, ObservationsByModel, PriceObservation } from '../filters/types.js'
import { RejectionTracker, type RejectionInput } from '../rejections/tracker.js'
import type { ConnectivityReport } from '../scraper/fetch/connectivity.js'
import { RunDeduper, type Deduper } from '../scraper/process/run-dedupe.js'
import type { Clock, Fetcher, ListingPageParser, RawAd } from '../scraper/types.js'
import { systemClock } from '../scraper/types.js'
import { ModelValidator } from '../validation/model-validator.js'
import type {
  IngestMetrics,
  IngestRunConfig,
  IngestRunDeps,
  IngestRunResult,
  ProgressCallback,
  ProgressDetails,
} from './types.js'

export const DEFAULT_MAX_CONSECUTIVE_EMPTY_PAGES = 3

/** Upper bound on pages per term when following pagination to the end */
export const ALL_PAGES_LIMIT = 200

const SCRAPE_PROGRESS_SHARE = 80

type PageOutcome = 'ok' | 'empty' | 'failed' | 'aborted'

export class IngestRun {
  readonly runId: string

  private readonly config: Required<IngestRunConfig>
  private readonly catalog: CatalogStore
  private readonly fetcher: Fetcher
  private readonly parser: ListingPageParser
  private readonly extractor: ModelExtractor
  private readonly validator: ModelValidator
  private readonly filter: StatisticalFilter
  private readonly fullComputer: KeywordMatcher
  private readonly deduper: Deduper
  private readonly connectivityCheck?: () => Promise<ConnectivityReport>
  private readonly onProgress?: ProgressCallback
  private readonly signal?: AbortSignal
  private readonly clock: Clock
  private readonly log: RunLogger

  private readonly tracker = new RejectionTracker()
  private readonly collected: ObservationsByModel = new Map()
  private readonly metrics: IngestMetrics = {
    termsProcessed: 0,
    pagesFetched: 0,
    pagesFailed: 0,
    adsSeen: 0,
    duplicates: 0,
    accepted: 0,
    rejectedBeforeFilter: 0,
    durationMs: 0,
  }

  constructor(config: IngestRunConfig, deps: IngestRunDeps) {
    this.config = {
      ...config,
      maxConsecutiveEmptyPages: config.maxConsecutiveEmptyPages ?? DEFAULT_MAX_CONSECUTIVE_EMPTY_PAGES,
    }
    this.runId = deps.runId ?? createId()
    this.catalog = deps.catalog
    this.fetcher = deps.fetcher
    this.parser = deps.parser
    this.validator = new ModelValidator(deps.catalog)
    this.extractor = new ModelExtractor(deps.catalog, this.validator)
    this.filter = new StatisticalFilter(deps.keywords, deps.filterConfig)
    this.fullComputer = new KeywordMatcher(deps.keywords.fullComputer)
    this.deduper = deps.deduper ?? new RunDeduper()
    this.connectivityCheck = deps.checkConnectivity
    this.onProgress = deps.onProgress
    this.signal = deps.signal
    this.clock = deps.clock ?? systemClock
    this.log = createRunLogger(loggers.pipeline, { runId: this.runId, stage: 'scrape' })
  }

  async run(): Promise<IngestRunResult> {
    const startedAt = this.clock.now()
    let connectivity: ConnectivityReport | undefined

    this.log.info('RUN_START', {
      terms: this.config.searchTerms.length,
      maxPagesPerTerm: this.config.allPages ? 'all' : this.config.maxPagesPerTerm,
      catalogEntries: this.catalog.size,
    })
    this.progress(0, 'Starting', {})

    try {
      if (this.connectivityCheck) {
        try {
          connectivity = await this.connectivityCheck()
        } catch (error) {
          this.log.error('RUN_PRECONDITION_FAILED', { check: 'connectivity' }, error)
          return this.result(startedAt, {
            success: false,
            stopped: false,
            observations: new Map(),
            filterStats: null,
            error: error instanceof Error ? error.message : String(error),
          })
        }
      }

      const stopped = await this.scrapeAllTerms()

      this.progress(SCRAPE_PROGRESS_SHARE, 'Filtering', {})
      const filtered = this.applyFilter()
      this.progress(100, stopped ? 'Stopped' : 'Done', {})

      return this.result(startedAt, {
        success: true,
        stopped,
        observations: filtered.kept,
        filterStats: filtered.stats,
        ...(connectivity ? { connectivity } : {}),
      })
    } catch (error) {
      this.log.error('RUN_FAILED', {}, error)
      return this.result(startedAt, {
        success: false,
        stopped: false,
        ...this.partialObservations(),
        error: error instanceof Error ? error.message : String(error),
        ...(connectivity ? { connectivity } : {}),
      })
    } finally {
      await this.deduper.cleanup()
    }
  }

  private applyFilter(): FilterResult {
    const filterLog = this.log.child({ stage: 'filter' })
    for (const line of this.filter.summarizeThresholds(this.collected)) {
      filterLog.debug('THRESHOLDS', { summary: line })
    }
    const filtered = this.filter.filter(this.collected)
    this.tracker.merge(filtered.rejected)
    return filtered
  }

  /**
   * What a failed run still hands back: the groups validated before the
   * failure, filtered like a complete run's.
   */
  private partialObservations(): { observations: ObservationsByModel; filterStats: FilterStats | null } {
    try {
      const filtered = this.applyFilter()
      return { observations: filtered.kept, filterStats: filtered.stats }
    } catch (error) {
      this.log.error('PARTIAL_FILTER_FAILED', { models: this.collected.size }, error)
      return { observations: this.collected, filterStats: null }
    }
  }

  /**
   * @returns true when the run was cancelled
   */
  private async scrapeAllTerms(): Promise<boolean> {
    const { searchTerms } = this.config

    for (const [termIndex, term] of searchTerms.entries()) {
      if (this.signal?.aborted) {
        this.log.warn('RUN_STOPPED', { term, termIndex })
        return true
      }

      const aborted = await this.scrapeTerm(term, termIndex)
      this.metrics.termsProcessed += 1
      if (aborted) {
        this.log.warn('RUN_STOPPED', { term, termIndex })
        return true
      }
    }
    return false
  }

  /**
   * @returns true when cancelled mid-term
   */
  private async scrapeTerm(term: string, termIndex: number): Promise<boolean> {
    const log = this.log.child({ term })
    const lastPage = this.config.allPages ? ALL_PAGES_LIMIT : this.config.maxPagesPerTerm
    let consecutiveEmpty = 0

    for (let page = 1; page <= lastPage; page++) {
      if (this.signal?.aborted) return true

      const { outcome, hasNextPage } = await this.scrapePage(term, page, log)
      if (outcome === 'aborted') return true

      this.progress(this.scrapeProgress(termIndex, page, lastPage), `Scraping "${term}"`, {
        term,
        page,
        termIndex,
      })

      if (outcome === 'ok') {
        consecutiveEmpty = 0
      } else {
        consecutiveEmpty += 1
        if (consecutiveEmpty >= this.config.maxConsecutiveEmptyPages) {
          log.warn('TERM_STOPPED_EMPTY_PAGES', { page, consecutiveEmpty })
          break
        }
        continue
      }

      if (!hasNextPage) {
        log.info('TERM_LAST_PAGE', { page })
        break
      }
    }
    return false
  }

  private async scrapePage(
    term: string,
    page: number,
    log: RunLogger
  ): Promise<{ outcome: PageOutcome; hasNextPage: boolean }> {
    const url = this.config.buildSearchUrl(term, page)
    const result = await this.fetcher.fetch(url, this.signal ? { signal: this.signal } : {})

    if (!result.ok) {
      if (result.error.kind === 'aborted') return { outcome: 'aborted', hasNextPage: false }
      this.metrics.pagesFailed += 1
      log.warn('PAGE_SKIPPED', { page, ...sanitizeUrl(url), kind: result.error.kind, attempts: result.attempts }, result.error)
      return { outcome: 'failed', hasNextPage: false }
    }

    this.metrics.pagesFetched += 1
    const listing = this.parser.parse(result.body, url)
    for (const ad of listing.ads) {
      await this.processAd(ad)
    }

    log.info('PAGE_DONE', { page, ads: listing.ads.length, hasNextPage: listing.hasNextPage, durationMs: result.durationMs })
    return { outcome: listing.ads.length > 0 ? 'ok' : 'empty', hasNextPage: listing.hasNextPage }
  }

  private async processAd(ad: RawAd): Promise<void> {
    this.metrics.adsSeen += 1
    const priceCents = Number.isFinite(ad.price) ? toCents(ad.price) : 0
    const base = { title: ad.title, priceCents, url: ad.url }

    if (priceCents <= 0) {
      this.reject({ ...base, reason: 'Missing or non-positive price', category: 'INVALID_PRICE', stage: 'price' })
      return
    }

    const text = `${ad.title} ${ad.description}`
    const computerKeyword = this.fullComputer.find(text)
    if (computerKeyword !== null) {
      this.reject({
        ...base,
        reason: `Full computer or laptop: "${computerKeyword}"`,
        category: 'FULL_COMPUTER',
        stage: 'prescreen',
      })
      return
    }

    const extraction = this.extractor.extract(ad.title, ad.description)
    if (!extraction.ok) {
      this.reject({
        ...base,
        ...(extraction.attemptedModel ? { model: extraction.attemptedModel } : {}),
        reason: extraction.message,
        category: extraction.reason,
        stage: 'extraction',
      })
      return
    }

    const validation = this.validator.validate(extraction.model)
    if (validation.status === 'rejected') {
      this.reject({
        ...base,
        model: validation.attemptedModel,
        reason: validation.message,
        category: validation.reason,
        stage: 'validation',
      })
      return
    }

    if (await this.deduper.checkAndAdd(ad.url)) {
      this.metrics.duplicates += 1
      return
    }

    const observation: PriceObservation = {
      model: validation.model,
      priceCents,
      url: ad.url,
      title: ad.title,
      description: ad.description,
    }
    const list = this.collected.get(observation.model)
    if (list) {
      list.push(observation)
    } else {
      this.collected.set(observation.model, [observation])
    }
    this.metrics.accepted += 1
  }

  private reject(input: RejectionInput): void {
    this.tracker.record(input)
    this.metrics.rejectedBeforeFilter += 1
    this.log.debug('AD_REJECTED', { category: input.category, reason: input.reason, ...sanitizeUrl(input.url) })
  }

  private scrapeProgress(termIndex: number, page: number, lastPage: number): number {
    const terms = Math.max(1, this.config.searchTerms.length)
    const pageFraction = this.config.allPages ? page / (page + 1) : Math.min(1, page / Math.max(1, lastPage))
    return Math.floor((SCRAPE_PROGRESS_SHARE * (termIndex + pageFraction)) / terms)
  }

  private progress(percent: number, status: string, details: Partial<ProgressDetails>): void {
    if (!this.onProgress) return
    let observations = 0
    for (const list of this.collected.values()) observations += list.length
    this.onProgress(percent, status, {
      ...details,
      totalTerms: this.config.searchTerms.length,
      observations,
    })
  }

  private result(
    startedAt: number,
    outcome: {
      success: boolean
      stopped: boolean
      observations: ObservationsByModel
      filterStats: FilterStats | null
      error?: string
      connectivity?: ConnectivityReport
    }
  ): IngestRunResult {
    this.metrics.durationMs = this.clock.now() - startedAt
    const result: IngestRunResult = {
      runId: this.runId,
      ...outcome,
      rejections: [...this.tracker.records()],
      rejectionSummary: this.tracker.summary(),
      metrics: { ...this.metrics },
    }
    this.log.info('RUN_END', {
      success: result.success,
      stopped: result.stopped,
      models: result.observations.size,
      kept: result.filterStats?.totalKept,
      rejected: result.rejections.length,
      ...this.metrics,
    })
    return result
  }
}
