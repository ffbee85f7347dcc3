/**
 * Harvester Settings
 *
 * Validates the process environment into one typed settings object.
 * Every invalid variable is reported at once through ConfigError.
 */

import { z } from 'zod'
import { DEFAULT_CATALOG_PATH, DEFAULT_CORRECTIONS_PATH } from '../catalog/catalog-store.js'
import { ConfigError } from '../errors.js'
import { DEFAULT_KEYWORDS_PATH } from '../filters/keywords.js'
import type { FilterConfig } from '../filters/types.js'
import { DEFAULT_PROBE_URL } from '../scraper/fetch/connectivity.js'
import type { HumanDelay } from '../scraper/fetch/http-fetcher.js'
import { DEFAULT_SELECTORS, type ListingSelectors } from '../scraper/parse/listing-page.js'
import type { ProxyConfig, RateLimitConfig, RetryPolicy } from '../scraper/types.js'
import { DEFAULT_RETRY_POLICY } from '../scraper/types.js'

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')

const list = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined))

const searchTemplate = z
  .string()
  .url()
  .refine((value) => value.includes('{term}'), 'must contain a {term} placeholder')

const envSchema = z
  .object({
    SEARCH_URL_TEMPLATE: searchTemplate,
    SEARCH_TERMS: list.pipe(z.array(z.string()).min(1, 'at least one search term is required')),
    MAX_PAGES_PER_TERM: z.coerce.number().int().min(1).default(3),
    SCRAPE_ALL_PAGES: flag.default('false'),

    RATE_LIMIT_CALLS: z.coerce.number().int().min(1).default(10),
    RATE_LIMIT_PERIOD_MS: z.coerce.number().int().min(1).default(60_000),
    HUMAN_DELAY_MIN_MS: z.coerce.number().int().min(0).default(2_000),
    HUMAN_DELAY_MAX_MS: z.coerce.number().int().min(0).default(5_000),
    FETCH_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
    FETCH_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxRetries),
    FETCH_BASE_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.baseDelayMs),
    FETCH_MAX_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.maxDelayMs),
    BLOCK_COOLDOWN_MS: z.coerce.number().int().min(0).default(DEFAULT_RETRY_POLICY.blockCooldownMs),

    PROXY_MODE: z.enum(['none', 'relay', 'rotating']).default('none'),
    PROXY_RELAY_URL: z.string().url().default('http://127.0.0.1:8118'),
    PROXY_LIST: list.pipe(z.array(z.string().url())).default(''),
    RELAY_CONTROL_HOST: optionalString,
    RELAY_CONTROL_PORT: z.coerce.number().int().min(1).max(65_535).default(9051),
    RELAY_CONTROL_PASSWORD: optionalString,
    RELAY_SETTLE_MS: z.coerce.number().int().min(0).default(5_000),
    CONNECTIVITY_PROBE_URL: z.string().url().default(DEFAULT_PROBE_URL),
    SKIP_CONNECTIVITY_CHECK: flag.default('false'),

    FILTER_LOW_FACTOR: z.coerce.number().positive().default(0.5),
    FILTER_HIGH_FACTOR: z.coerce.number().positive().default(3),
    FILTER_HIGH_ENABLED: flag.default('true'),
    FILTER_MIN_SAMPLE_SIZE: z.coerce.number().int().min(1).default(3),
    FILTER_ABSOLUTE_FLOOR: z.coerce.number().min(0).default(50),

    CATALOG_PATH: z.string().min(1).default(DEFAULT_CATALOG_PATH),
    CORRECTIONS_PATH: z.string().min(1).default(DEFAULT_CORRECTIONS_PATH),
    KEYWORDS_PATH: z.string().min(1).default(DEFAULT_KEYWORDS_PATH),
    REDIS_URL: optionalString,

    SELECTOR_CARD: z.string().min(1).default(DEFAULT_SELECTORS.card),
    SELECTOR_LINK: z.string().min(1).default(DEFAULT_SELECTORS.link),
    SELECTOR_TITLE: z.string().min(1).default(DEFAULT_SELECTORS.title),
    SELECTOR_PRICE: z.string().min(1).default(DEFAULT_SELECTORS.price),
    SELECTOR_DESCRIPTION: z.string().min(1).default(DEFAULT_SELECTORS.description),
    SELECTOR_NEXT_PAGE: z.string().min(1).default(DEFAULT_SELECTORS.nextPage),
  })
  .superRefine((env, ctx) => {
    if (env.HUMAN_DELAY_MAX_MS < env.HUMAN_DELAY_MIN_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HUMAN_DELAY_MAX_MS'],
        message: 'must not be below HUMAN_DELAY_MIN_MS',
      })
    }
    if (env.PROXY_MODE === 'rotating' && env.PROXY_LIST.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PROXY_LIST'],
        message: 'rotating mode needs at least one proxy URL',
      })
    }
  })

export interface HarvesterSettings {
  searchUrlTemplate: string
  searchTerms: string[]
  maxPagesPerTerm: number
  allPages: boolean
  rateLimit: RateLimitConfig
  humanDelay: HumanDelay
  fetchTimeoutMs: number
  retryPolicy: RetryPolicy
  proxy: ProxyConfig
  connectivity: { probeUrl: string; enabled: boolean }
  filter: FilterConfig
  catalogPath: string
  correctionsPath: string
  keywordsPath: string
  redisUrl?: string
  selectors: ListingSelectors
}

/**
 * Parse settings from an environment map (process.env by default).
 * @throws ConfigError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): HarvesterSettings {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error)
  }
  const e = parsed.data

  return {
    searchUrlTemplate: e.SEARCH_URL_TEMPLATE,
    searchTerms: e.SEARCH_TERMS,
    maxPagesPerTerm: e.MAX_PAGES_PER_TERM,
    allPages: e.SCRAPE_ALL_PAGES,
    rateLimit: { calls: e.RATE_LIMIT_CALLS, periodMs: e.RATE_LIMIT_PERIOD_MS },
    humanDelay: { minMs: e.HUMAN_DELAY_MIN_MS, maxMs: e.HUMAN_DELAY_MAX_MS },
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    retryPolicy: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: e.FETCH_MAX_RETRIES,
      baseDelayMs: e.FETCH_BASE_DELAY_MS,
      maxDelayMs: e.FETCH_MAX_DELAY_MS,
      blockCooldownMs: e.BLOCK_COOLDOWN_MS,
    },
    proxy: proxyConfig(e),
    connectivity: { probeUrl: e.CONNECTIVITY_PROBE_URL, enabled: !e.SKIP_CONNECTIVITY_CHECK },
    filter: {
      lowFactor: e.FILTER_LOW_FACTOR,
      highFactor: e.FILTER_HIGH_FACTOR,
      highEnabled: e.FILTER_HIGH_ENABLED,
      minSampleSize: e.FILTER_MIN_SAMPLE_SIZE,
      absoluteFloorCents: Math.round(e.FILTER_ABSOLUTE_FLOOR * 100),
    },
    catalogPath: e.CATALOG_PATH,
    correctionsPath: e.CORRECTIONS_PATH,
    keywordsPath: e.KEYWORDS_PATH,
    ...(e.REDIS_URL ? { redisUrl: e.REDIS_URL } : {}),
    selectors: {
      card: e.SELECTOR_CARD,
      link: e.SELECTOR_LINK,
      title: e.SELECTOR_TITLE,
      price: e.SELECTOR_PRICE,
      description: e.SELECTOR_DESCRIPTION,
      nextPage: e.SELECTOR_NEXT_PAGE,
    },
  }
}

function proxyConfig(e: z.infer<typeof envSchema>): ProxyConfig {
  switch (e.PROXY_MODE) {
    case 'none':
      return { mode: 'none' }
    case 'rotating':
      return { mode: 'rotating', urls: e.PROXY_LIST }
    case 'relay':
      return {
        mode: 'relay',
        url: e.PROXY_RELAY_URL,
        ...(e.RELAY_CONTROL_HOST
          ? {
              control: {
                host: e.RELAY_CONTROL_HOST,
                port: e.RELAY_CONTROL_PORT,
                settleMs: e.RELAY_SETTLE_MS,
                ...(e.RELAY_CONTROL_PASSWORD ? { password: e.RELAY_CONTROL_PASSWORD } : {}),
              },
            }
          : {}),
      }
  }
}

/**
 * Fill the search template. The term is URL-encoded; without a {page}
 * placeholder a `page` query parameter is set for pages after the first.
 */
export function buildSearchUrl(template: string, term: string, page: number): string {
  const filled = template.replaceAll('{term}', encodeURIComponent(term))
  if (filled.includes('{page}')) {
    return filled.replaceAll('{page}', String(page))
  }
  if (page <= 1) return filled
  const url = new URL(filled)
  url.searchParams.set('page', String(page))
  return url.toString()
}
