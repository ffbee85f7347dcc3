/**
 * HTTP Fetcher Implementation
 *
 * Every attempt goes through the rate limiter, waits a human-like pause and
 * sends browser headers, optionally through a proxy. Transient failures are
 * retried per the RetryPolicy; a block rotates the proxy identity and backs
 * off for at least the block cool-down.
 */

import { fetch as undiciFetch } from 'undici'
import { loggers } from '../../config/logger.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import { FetchError, type FetchErrorKind } from '../../errors.js'
import type {
  AttemptFailure,
  Clock,
  Fetcher,
  FetchOptions,
  FetchResult,
  HttpClient,
  HttpResponse,
  RateLimiter,
  RetryPolicy,
} from '../types.js'
import { computeBackoffDelay, DEFAULT_RETRY_POLICY, systemClock } from '../types.js'
import { buildRequestHeaders } from './headers.js'
import type { ProxyRotator } from './proxy.js'
import { SlidingWindowRateLimiter } from './rate-limiter.js'

const log = loggers.fetch

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000

export interface HumanDelay {
  minMs: number
  maxMs: number
}

export const DEFAULT_HUMAN_DELAY: HumanDelay = { minMs: 2_000, maxMs: 5_000 }

/**
 * Default transport: undici fetch, following redirects.
 */
export const undiciHttpClient: HttpClient = (request) =>
  undiciFetch(request.url, {
    method: 'GET',
    headers: request.headers,
    signal: request.signal,
    redirect: 'follow',
    ...(request.dispatcher ? { dispatcher: request.dispatcher } : {}),
  })

export interface HttpFetcherOptions {
  rateLimiter?: RateLimiter
  retryPolicy?: RetryPolicy
  proxy?: ProxyRotator
  httpClient?: HttpClient
  clock?: Clock
  random?: () => number
  timeoutMs?: number
  humanDelay?: HumanDelay
}

interface AttemptError extends AttemptFailure {
  message: string
  retryAfterMs?: number
  cause?: unknown
}

type AttemptOutcome = { ok: true; statusCode: number; body: string } | { ok: false; failure: AttemptError }

export class HttpFetcher implements Fetcher {
  private readonly rateLimiter: RateLimiter
  private readonly retryPolicy: RetryPolicy
  private readonly proxy?: ProxyRotator
  private readonly httpClient: HttpClient
  private readonly clock: Clock
  private readonly random: () => number
  private readonly timeoutMs: number
  private readonly humanDelay: HumanDelay

  constructor(options: HttpFetcherOptions = {}) {
    this.clock = options.clock ?? systemClock
    this.rateLimiter = options.rateLimiter ?? new SlidingWindowRateLimiter(undefined, this.clock)
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.proxy = options.proxy
    this.httpClient = options.httpClient ?? undiciHttpClient
    this.random = options.random ?? Math.random
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    this.humanDelay = options.humanDelay ?? DEFAULT_HUMAN_DELAY
  }

  /**
   * Fetch a URL and return the page body, or the last failure once the
   * retry policy gives up.
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = this.clock.now()
    const { signal } = options
    let attempts = 0

    for (;;) {
      if (signal?.aborted) {
        return this.failed(url, { kind: 'aborted', message: 'Fetch cancelled' }, attempts, startTime)
      }

      attempts += 1
      await this.rateLimiter.acquire(url)
      await this.clock.sleep(this.nextHumanDelay(), signal)
      if (signal?.aborted) {
        return this.failed(url, { kind: 'aborted', message: 'Fetch cancelled' }, attempts, startTime)
      }

      const outcome = await this.fetchOnce(url, signal)
      if (outcome.ok) {
        return {
          ok: true,
          url,
          statusCode: outcome.statusCode,
          body: outcome.body,
          attempts,
          durationMs: this.clock.now() - startTime,
        }
      }

      const { failure } = outcome
      const retriesUsed = attempts - 1
      if (failure.kind === 'aborted' || !this.retryPolicy.retryable(failure) || retriesUsed >= this.retryPolicy.maxRetries) {
        return this.failed(url, failure, attempts, startTime)
      }

      let delayMs = computeBackoffDelay(this.retryPolicy, retriesUsed, this.random)
      if (failure.kind === 'rate_limited' && failure.retryAfterMs !== undefined) {
        delayMs = Math.max(delayMs, failure.retryAfterMs)
      }
      if (failure.kind === 'blocked') {
        const rotated = (await this.proxy?.rotateIdentity()) ?? false
        delayMs = Math.max(delayMs, this.retryPolicy.blockCooldownMs)
        log.warn('Blocked, cooling down', { ...sanitizeUrl(url), statusCode: failure.statusCode, rotated, delayMs })
      } else {
        log.warn('Fetch attempt failed, retrying', {
          ...sanitizeUrl(url),
          kind: failure.kind,
          statusCode: failure.statusCode,
          attempt: attempts,
          delayMs,
        })
      }

      await this.clock.sleep(delayMs, signal)
    }
  }

  /**
   * Single attempt (no retries).
   */
  private async fetchOnce(url: string, signal: AbortSignal | undefined): Promise<AttemptOutcome> {
    const controller = new AbortController()
    let timedOut = false
    const onAbort = (): void => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.timeoutMs)

    const selection = this.proxy?.next() ?? { proxyUrl: null }
    const headers = buildRequestHeaders(this.random)

    try {
      const response = await this.httpClient({
        url,
        headers,
        signal: controller.signal,
        ...(selection.dispatcher ? { dispatcher: selection.dispatcher } : {}),
      })
      return await this.classifyResponse(response)
    } catch (error) {
      if (timedOut) {
        return { ok: false, failure: { kind: 'timeout', message: `Request timed out after ${this.timeoutMs}ms`, cause: error } }
      }
      if (signal?.aborted) {
        return { ok: false, failure: { kind: 'aborted', message: 'Fetch cancelled', cause: error } }
      }
      const message = error instanceof Error ? error.message : String(error)
      return { ok: false, failure: { kind: 'network', message, cause: error } }
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  private async classifyResponse(response: HttpResponse): Promise<AttemptOutcome> {
    const { status } = response

    if (status >= 200 && status < 300) {
      return { ok: true, statusCode: status, body: await response.text() }
    }

    if (status === 403) {
      return { ok: false, failure: { kind: 'blocked', statusCode: status, message: 'Request blocked (403)' } }
    }

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.clock.now())
      return {
        ok: false,
        failure: {
          kind: 'rate_limited',
          statusCode: status,
          message: 'Rate limited (429)',
          ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
        },
      }
    }

    // Challenge pages are commonly served as 503
    if (status === 503 && looksLikeBlockedPage(await response.text())) {
      return {
        ok: false,
        failure: { kind: 'blocked', statusCode: status, message: 'Request blocked (captcha or access denied)' },
      }
    }

    return {
      ok: false,
      failure: { kind: 'http', statusCode: status, message: `HTTP ${status}: ${response.statusText}` },
    }
  }

  private nextHumanDelay(): number {
    const { minMs, maxMs } = this.humanDelay
    return Math.round(minMs + this.random() * Math.max(0, maxMs - minMs))
  }

  private failed(url: string, failure: AttemptError, attempts: number, startTime: number): FetchResult {
    const kind: FetchErrorKind = failure.kind
    const error = new FetchError(kind, failure.message, {
      url,
      attempts,
      ...(failure.statusCode !== undefined ? { statusCode: failure.statusCode } : {}),
      ...(failure.cause !== undefined ? { cause: failure.cause } : {}),
    })
    return { ok: false, url, error, attempts, durationMs: this.clock.now() - startTime }
  }
}

/**
 * Retry-After is either delay-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000
  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return undefined
  return Math.max(0, date - now)
}

/**
 * Heuristic check for blocked/captcha pages.
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  const blockIndicators = [
    'captcha',
    'recaptcha',
    'hcaptcha',
    'challenge-form',
    'challenge-running',
    'cf-browser-verification',
    'please verify you are a human',
    'access denied',
    'bot detection',
  ]

  return blockIndicators.some((indicator) => lowerHtml.includes(indicator))
}
