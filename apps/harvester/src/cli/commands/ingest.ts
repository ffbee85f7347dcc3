import { createId } from '@paralleldrive/cuid2'
import type { Redis } from 'ioredis'
import { CatalogStore } from '../../catalog/catalog-store.js'
import { loggers } from '../../config/logger.js'
import { createRedisClient } from '../../config/redis.js'
import { buildSearchUrl, loadSettings, type HarvesterSettings } from '../../config/settings.js'
import { classifyError, EXIT_CODES } from '../../errors.js'
import { loadFilterKeywords, type FilterKeywords } from '../../filters/keywords.js'
import { IngestRun } from '../../pipeline/orchestrator.js'
import type { IngestRunResult } from '../../pipeline/types.js'
import { checkConnectivity } from '../../scraper/fetch/connectivity.js'
import { HttpFetcher } from '../../scraper/fetch/http-fetcher.js'
import { ProxyRotator } from '../../scraper/fetch/proxy.js'
import { RedisRateLimiter, SlidingWindowRateLimiter } from '../../scraper/fetch/rate-limiter.js'
import { SelectorListingParser } from '../../scraper/parse/listing-page.js'
import { RedisRunDeduper, RunDeduper } from '../../scraper/process/run-dedupe.js'
import { rankByValue } from '../../value/value.js'
import { formatRunReport, toJsonReport } from '../report.js'

const log = loggers.cli

export interface IngestCommandArgs {
  /** Overrides SEARCH_TERMS */
  terms?: string[]
  /** Overrides MAX_PAGES_PER_TERM */
  maxPages?: number
  allPages?: boolean
  json: boolean
  env?: NodeJS.ProcessEnv
}

export async function runIngestCommand(args: IngestCommandArgs): Promise<number> {
  if (args.maxPages !== undefined && (!Number.isInteger(args.maxPages) || args.maxPages < 1)) {
    console.error('--max-pages must be a positive integer')
    return EXIT_CODES.INVALID_INPUT
  }

  let settings: HarvesterSettings
  let catalog: CatalogStore
  let keywords: FilterKeywords
  try {
    settings = loadSettings(args.env ?? process.env)
    catalog = await CatalogStore.load({ catalogPath: settings.catalogPath, correctionsPath: settings.correctionsPath })
    keywords = await loadFilterKeywords(settings.keywordsPath)
  } catch (error) {
    const classified = classifyError(error)
    log.error('Ingest setup failed', { code: classified.code }, error)
    console.error(classified.message)
    return classified.exitCode
  }

  const runId = createId()
  const redis: Redis | null = settings.redisUrl ? createRedisClient(settings.redisUrl) : null
  const proxy = new ProxyRotator(settings.proxy)
  const controller = new AbortController()
  const onSignal = (): void => {
    log.warn('Interrupt received, finishing the current page')
    controller.abort()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  let result: IngestRunResult
  try {
    const fetcher = new HttpFetcher({
      rateLimiter: redis
        ? new RedisRateLimiter(redis, { config: settings.rateLimit })
        : new SlidingWindowRateLimiter(settings.rateLimit),
      retryPolicy: settings.retryPolicy,
      proxy,
      timeoutMs: settings.fetchTimeoutMs,
      humanDelay: settings.humanDelay,
    })
    const template = settings.searchUrlTemplate

    const run = new IngestRun(
      {
        searchTerms: args.terms ?? settings.searchTerms,
        maxPagesPerTerm: args.maxPages ?? settings.maxPagesPerTerm,
        allPages: args.allPages ?? settings.allPages,
        buildSearchUrl: (term, page) => buildSearchUrl(template, term, page),
      },
      {
        runId,
        catalog,
        fetcher,
        parser: new SelectorListingParser(settings.selectors),
        keywords,
        filterConfig: settings.filter,
        deduper: redis ? new RedisRunDeduper(redis, runId) : new RunDeduper(),
        signal: controller.signal,
        ...(settings.connectivity.enabled
          ? { checkConnectivity: () => checkConnectivity(proxy, { probeUrl: settings.connectivity.probeUrl }) }
          : {}),
        onProgress: (percent, status, details) => {
          log.info('Progress', { percent, status, observations: details.observations })
        },
      }
    )
    result = await run.run()
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    await proxy.close()
    if (redis) {
      await redis.quit()
    }
  }

  const ranking = rankByValue(result.observations, catalog)
  if (args.json) {
    console.log(JSON.stringify(toJsonReport(result, ranking), null, 2))
  } else {
    for (const line of formatRunReport(result, ranking)) {
      console.log(line)
    }
  }

  return result.success ? EXIT_CODES.OK : EXIT_CODES.FAILURE
}
