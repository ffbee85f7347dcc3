/**
 * Scraper Core Types
 *
 * Listing input contract, fetcher, rate limiter, retry policy and proxy
 * configuration shared by the fetch, parse and pipeline layers.
 */

import type { Dispatcher } from 'undici'
import type { FetchError, FetchErrorKind } from '../errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Listing Input Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One marketplace listing as produced by a page parser.
 * Immutable once created.
 */
export interface RawAd {
  title: string
  /** Asking price in the marketplace currency (decimal, e.g. 450.5) */
  price: number
  url: string
  description: string
}

export interface ListingPage {
  ads: RawAd[]
  hasNextPage: boolean
}

/**
 * Turns a fetched search-results page into listings.
 * Marketplace-specific; the pipeline only sees this boundary.
 */
export interface ListingPageParser {
  parse(html: string, pageUrl: string): ListingPage
}

// ═══════════════════════════════════════════════════════════════════════════════
// Clock
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Time source for everything that waits. Tests inject a fake that advances
 * virtual time instead of sleeping.
 */
export interface Clock {
  now(): number
  /** Resolves after `ms`, or early when the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (ms <= 0 || signal?.aborted) {
        resolve()
        return
      }
      const done = (): void => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', done)
        resolve()
      }
      const timer = setTimeout(done, ms)
      signal?.addEventListener('abort', done, { once: true })
    }),
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Limiting
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * At most `calls` requests within any trailing `periodMs` window.
 */
export interface RateLimitConfig {
  calls: number
  periodMs: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  calls: 10,
  periodMs: 60_000,
}

export interface RateLimiter {
  /**
   * Resolve once another request to `target` (a URL or domain) fits
   * in the window. Blocks the caller until then.
   */
  acquire(target: string): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface AttemptFailure {
  kind: FetchErrorKind
  statusCode?: number
}

export interface RetryPolicy {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number
  /** Delay before the first retry */
  baseDelayMs: number
  /** Multiplier applied per retry */
  backoffFactor: number
  maxDelayMs: number
  /** Random extra delay, as a fraction of the computed delay */
  jitterRatio: number
  /** Minimum wait after a block (403) once the identity was rotated */
  blockCooldownMs: number
  retryable: (failure: AttemptFailure) => boolean
}

/**
 * Timeouts, connection errors, throttling, blocks and 5xx are transient.
 * Other HTTP errors and cancellation are final.
 */
export function isTransientFailure(failure: AttemptFailure): boolean {
  switch (failure.kind) {
    case 'timeout':
    case 'network':
    case 'rate_limited':
    case 'blocked':
      return true
    case 'http':
      return failure.statusCode !== undefined && failure.statusCode >= 500
    case 'aborted':
      return false
  }
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 30_000,
  backoffFactor: 2,
  maxDelayMs: 120_000,
  jitterRatio: 0.25,
  blockCooldownMs: 90_000,
  retryable: isTransientFailure,
}

/**
 * Delay before retry number `retryIndex` (0-based):
 * baseDelayMs * backoffFactor^retryIndex, plus jitter, capped at maxDelayMs.
 */
export function computeBackoffDelay(policy: RetryPolicy, retryIndex: number, random: () => number): number {
  const delay = policy.baseDelayMs * Math.pow(policy.backoffFactor, retryIndex)
  const jitter = delay * policy.jitterRatio * random()
  return Math.min(Math.round(delay + jitter), policy.maxDelayMs)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

export interface FetchSuccess {
  ok: true
  url: string
  statusCode: number
  body: string
  attempts: number
  durationMs: number
}

export interface FetchFailure {
  ok: false
  url: string
  error: FetchError
  attempts: number
  durationMs: number
}

export type FetchResult = FetchSuccess | FetchFailure

export interface FetchOptions {
  /** Cancels pending waits and the in-flight request */
  signal?: AbortSignal
}

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP Client Seam
// ═══════════════════════════════════════════════════════════════════════════════

export interface HttpRequest {
  url: string
  headers: Record<string, string>
  dispatcher?: Dispatcher
  signal: AbortSignal
}

/** The part of a fetch Response the fetcher reads */
export interface HttpResponse {
  status: number
  statusText: string
  headers: { get(name: string): string | null }
  text(): Promise<string>
}

export type HttpClient = (request: HttpRequest) => Promise<HttpResponse>

// ═══════════════════════════════════════════════════════════════════════════════
// Proxy Configuration
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Control port of an anonymizing relay, used to request a new exit identity.
 */
export interface RelayControlConfig {
  host: string
  port: number
  password?: string
  /** Wait after a successful renewal so the new circuit is in place */
  settleMs: number
}

export type ProxyConfig =
  | { mode: 'none' }
  | { mode: 'relay'; url: string; control?: RelayControlConfig }
  | { mode: 'rotating'; urls: string[] }
