import { Agent } from 'undici'
import { describe, expect, it, vi } from 'vitest'
import { FakeClock, fakeResponse, scriptedHttpClient } from '../../__tests__/helpers/fakes.js'
import { USER_AGENT_POOL } from '../fetch/headers.js'
import { HttpFetcher, looksLikeBlockedPage, parseRetryAfter } from '../fetch/http-fetcher.js'
import { ProxyRotator } from '../fetch/proxy.js'
import type { HttpClient, HttpRequest, RetryPolicy } from '../types.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'

const PAGE_URL = 'https://market.example.bg/search?q=rtx&page=1'

function setup(client: HttpClient, overrides: { retryPolicy?: RetryPolicy; proxy?: ProxyRotator; timeoutMs?: number } = {}) {
  const clock = new FakeClock()
  const rateLimiter = { acquire: vi.fn((_target: string) => Promise.resolve()) }
  const fetcher = new HttpFetcher({
    httpClient: client,
    clock,
    rateLimiter,
    random: () => 0,
    ...overrides,
  })
  return { clock, rateLimiter, fetcher }
}

const noRetries: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxRetries: 0 }

describe('HttpFetcher', () => {
  it('returns the body on success', async () => {
    const client = scriptedHttpClient([fakeResponse(200, '<html>ok</html>')])
    const { fetcher, clock, rateLimiter } = setup(client)

    const result = await fetcher.fetch(PAGE_URL)

    expect(result).toEqual({ ok: true, url: PAGE_URL, statusCode: 200, body: '<html>ok</html>', attempts: 1, durationMs: 2000 })
    expect(clock.sleeps).toEqual([2000])
    expect(rateLimiter.acquire).toHaveBeenCalledWith(PAGE_URL)
    expect(client.requests[0]?.headers['User-Agent']).toBe(USER_AGENT_POOL[0]?.userAgent)
    expect(client.requests[0]?.dispatcher).toBeUndefined()
  })

  it('retries a 5xx with exponential backoff', async () => {
    const client = scriptedHttpClient([fakeResponse(500), fakeResponse(200, 'ok')])
    const { fetcher, clock, rateLimiter } = setup(client)

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(true)
    expect(result.attempts).toBe(2)
    expect(result.durationMs).toBe(34000)
    expect(clock.sleeps).toEqual([2000, 30000, 2000])
    expect(rateLimiter.acquire).toHaveBeenCalledTimes(2)
  })

  it('rotates the relay identity on every block and gives up after the last retry', async () => {
    const renewer = { renew: vi.fn(() => Promise.resolve(true)) }
    const proxy = new ProxyRotator(
      { mode: 'relay', url: 'http://127.0.0.1:8118' },
      { renewer, dispatcherFactory: () => new Agent() }
    )
    const client = scriptedHttpClient([fakeResponse(403)])
    const { fetcher, clock } = setup(client, { proxy })

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('blocked')
    expect(result.error.statusCode).toBe(403)
    expect(result.error.attempts).toBe(4)
    expect(result.attempts).toBe(4)
    expect(renewer.renew).toHaveBeenCalledTimes(3)
    expect(clock.sleeps).toEqual([2000, 90000, 2000, 90000, 2000, 120000, 2000])
    expect(client.requests[0]?.dispatcher).toBeDefined()
    await proxy.close()
  })

  it('honours Retry-After on 429 when it is longer than the backoff', async () => {
    const client = scriptedHttpClient([fakeResponse(429, '', { 'Retry-After': '120' }), fakeResponse(200, 'ok')])
    const { fetcher, clock } = setup(client)

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(true)
    expect(clock.sleeps).toEqual([2000, 120000, 2000])
  })

  it('does not retry a 404', async () => {
    const client = scriptedHttpClient([fakeResponse(404)])
    const { fetcher, clock } = setup(client)

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('http')
    expect(result.error.statusCode).toBe(404)
    expect(result.error.message).toBe('HTTP 404: Status 404')
    expect(result.attempts).toBe(1)
    expect(clock.sleeps).toEqual([2000])
  })

  it('retries network errors', async () => {
    const client = scriptedHttpClient([new Error('socket hang up'), fakeResponse(200, 'ok')])
    const { fetcher } = setup(client)

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(true)
    expect(result.attempts).toBe(2)
  })

  it('reports the network error once retries are exhausted', async () => {
    const client = scriptedHttpClient([new Error('socket hang up')])
    const { fetcher } = setup(client, { retryPolicy: noRetries })

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('network')
    expect(result.error.message).toBe('socket hang up')
    expect(result.error.url).toBe(PAGE_URL)
  })

  it('treats a 503 challenge page as a block', async () => {
    const client = scriptedHttpClient([fakeResponse(503, '<div id="challenge-form">verify</div>')])
    const { fetcher } = setup(client, { retryPolicy: noRetries })

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('blocked')
    expect(result.error.statusCode).toBe(503)
  })

  it('times out a request that never answers', async () => {
    const hanging: HttpClient = (request: HttpRequest) =>
      new Promise((_resolve, reject) => {
        request.signal.addEventListener('abort', () => reject(new Error('aborted')))
      })
    const { fetcher } = setup(hanging, { retryPolicy: noRetries, timeoutMs: 5 })

    const result = await fetcher.fetch(PAGE_URL)

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('timeout')
    expect(result.error.message).toBe('Request timed out after 5ms')
  })

  it('does nothing once cancelled', async () => {
    const client = scriptedHttpClient([fakeResponse(200, 'ok')])
    const { fetcher } = setup(client)
    const controller = new AbortController()
    controller.abort()

    const result = await fetcher.fetch(PAGE_URL, { signal: controller.signal })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.kind).toBe('aborted')
    expect(result.attempts).toBe(0)
    expect(client.requests).toHaveLength(0)
  })
})

describe('parseRetryAfter', () => {
  it('reads delay-seconds', () => {
    expect(parseRetryAfter('120', 0)).toBe(120000)
  })

  it('reads an HTTP date relative to now', () => {
    const date = 'Wed, 21 Oct 2026 07:28:00 GMT'
    expect(parseRetryAfter(date, Date.parse(date) - 5000)).toBe(5000)
  })

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null, 0)).toBeUndefined()
    expect(parseRetryAfter('soon', 0)).toBeUndefined()
  })
})

describe('looksLikeBlockedPage', () => {
  it('spots captcha markers', () => {
    expect(looksLikeBlockedPage('<script src="https://www.google.com/recaptcha/api.js"></script>')).toBe(true)
    expect(looksLikeBlockedPage('<h1>Temporarily unavailable</h1>')).toBe(false)
  })
})
