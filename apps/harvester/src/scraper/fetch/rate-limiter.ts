/**
 * Rate Limiters
 *
 * Sliding window: at most `calls` requests within any trailing `periodMs`.
 *
 * - SlidingWindowRateLimiter: in-process, one budget for the run
 * - RedisRateLimiter: shared across processes, one budget per registrable domain
 */

import { loggers } from '../../config/logger.js'
import type { Clock, RateLimitConfig, RateLimiter } from '../types.js'
import { DEFAULT_RATE_LIMIT, systemClock } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'

const log = loggers.fetch

function assertValidConfig(config: RateLimitConfig): void {
  if (!Number.isInteger(config.calls) || config.calls < 1) {
    throw new RangeError(`Rate limit calls must be a positive integer, got ${config.calls}`)
  }
  if (!(config.periodMs > 0)) {
    throw new RangeError(`Rate limit period must be positive, got ${config.periodMs}`)
  }
}

/**
 * In-memory sliding window over the timestamps of the last `calls` requests.
 * Concurrent callers are served one at a time in arrival order.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly timestamps: number[] = []
  private tail: Promise<void> = Promise.resolve()

  constructor(
    private readonly config: RateLimitConfig = DEFAULT_RATE_LIMIT,
    private readonly clock: Clock = systemClock
  ) {
    assertValidConfig(config)
  }

  acquire(_target = ''): Promise<void> {
    const slot = this.tail.then(() => this.takeSlot())
    // Later callers wait for this one whether it succeeds or not;
    // its own failure reaches its caller through `slot`.
    this.tail = slot.then(
      () => undefined,
      () => undefined
    )
    return slot
  }

  /** Requests recorded in the current window */
  get inWindow(): number {
    this.evictExpired(this.clock.now())
    return this.timestamps.length
  }

  private async takeSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now()
      this.evictExpired(now)

      if (this.timestamps.length < this.config.calls) {
        this.timestamps.push(now)
        return
      }

      const oldest = this.timestamps[0] ?? now
      const waitMs = oldest + this.config.periodMs - now
      log.debug('Rate limit reached, waiting', { waitMs, calls: this.config.calls, periodMs: this.config.periodMs })
      await this.clock.sleep(waitMs)
    }
  }

  private evictExpired(now: number): void {
    while (this.timestamps.length > 0) {
      const oldest = this.timestamps[0] ?? now
      if (now - oldest < this.config.periodMs) break
      this.timestamps.shift()
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Redis-backed
// ═══════════════════════════════════════════════════════════════════════════════

/** Key prefix for rate limiter state in Redis */
const REDIS_KEY_PREFIX = 'harvester:ratelimit:'

/**
 * Redis commands the limiter needs. An ioredis client satisfies it.
 */
export interface RateLimiterRedis {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>
}

export interface RedisRateLimiterOptions {
  config?: RateLimitConfig
  /** Override the window per registrable domain */
  domainOverrides?: Map<string, RateLimitConfig>
  clock?: Clock
}

/**
 * Atomic sliding window on a sorted set: members are request ids scored by
 * timestamp. Returns {1, 0} when a slot was taken, {0, retryAfterMs} otherwise.
 */
const ACQUIRE_SCRIPT = `
  local key = KEYS[1]
  local now = tonumber(ARGV[1])
  local periodMs = tonumber(ARGV[2])
  local calls = tonumber(ARGV[3])
  local member = ARGV[4]

  redis.call('ZREMRANGEBYSCORE', key, '-inf', now - periodMs)

  local count = redis.call('ZCARD', key)
  if count < calls then
    redis.call('ZADD', key, now, member)
    redis.call('PEXPIRE', key, periodMs * 2)
    return {1, 0}
  end

  local oldest = redis.call('ZRANGE', key, 0, 0, 'WITHSCORES')
  if #oldest >= 2 then
    return {0, tonumber(oldest[2]) + periodMs - now}
  end
  return {0, periodMs}
`

function parseAcquireReply(reply: unknown): { acquired: boolean; retryAfterMs: number } {
  if (Array.isArray(reply) && reply.length >= 2) {
    const [acquired, retryAfter] = reply
    return { acquired: Number(acquired) === 1, retryAfterMs: Math.max(0, Number(retryAfter) || 0) }
  }
  throw new Error(`Unexpected rate limiter reply: ${JSON.stringify(reply)}`)
}

export class RedisRateLimiter implements RateLimiter {
  private readonly config: RateLimitConfig
  private readonly domainOverrides: Map<string, RateLimitConfig>
  private readonly clock: Clock
  private sequence = 0

  constructor(
    private readonly redis: RateLimiterRedis,
    options: RedisRateLimiterOptions = {}
  ) {
    this.config = options.config ?? DEFAULT_RATE_LIMIT
    this.domainOverrides = options.domainOverrides ?? new Map()
    this.clock = options.clock ?? systemClock
    assertValidConfig(this.config)
  }

  async acquire(target: string): Promise<void> {
    const domain = this.domainFor(target)
    const config = this.getConfig(domain)
    const key = `${REDIS_KEY_PREFIX}${domain}`

    for (;;) {
      const now = this.clock.now()
      this.sequence += 1
      const member = `${now}:${process.pid}:${this.sequence}`

      const reply = await this.redis.eval(ACQUIRE_SCRIPT, 1, key, now, config.periodMs, config.calls, member)
      const result = parseAcquireReply(reply)
      if (result.acquired) return

      const waitMs = Math.max(result.retryAfterMs, 1)
      log.debug('Shared rate limit reached, waiting', { domain, waitMs })
      await this.clock.sleep(waitMs)
    }
  }

  getConfig(domain: string): RateLimitConfig {
    return this.domainOverrides.get(domain) ?? this.config
  }

  private domainFor(target: string): string {
    if (!target.includes('://')) return target
    try {
      return getRegistrableDomain(target)
    } catch {
      return target
    }
  }
}
