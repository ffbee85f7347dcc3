/**
 * Run-Level Deduplication
 *
 * The same ad shows up under several search terms and result pages.
 * Listings are keyed by canonical URL; the first sighting wins.
 *
 * - RunDeduper: in-memory set, one process
 * - RedisRunDeduper: Redis set per run id, shared across processes
 */

import { loggers } from '../../config/logger.js'
import { sanitizeUrl } from '../../config/structured-log.js'
import { dedupeKeyForUrl } from '../utils/url.js'

const log = loggers.dedupe

export interface Deduper {
  /**
   * Record the URL and report whether it was already seen in this run.
   * @returns true if duplicate (already seen), false if new
   */
  checkAndAdd(url: string): Promise<boolean>
  /** Distinct URLs seen so far */
  count(): Promise<number>
  /** Forget everything seen in this run */
  cleanup(): Promise<void>
}

export class RunDeduper implements Deduper {
  private readonly seen = new Set<string>()

  checkAndAdd(url: string): Promise<boolean> {
    const key = dedupeKeyForUrl(url)
    if (this.seen.has(key)) return Promise.resolve(true)
    this.seen.add(key)
    return Promise.resolve(false)
  }

  count(): Promise<number> {
    return Promise.resolve(this.seen.size)
  }

  cleanup(): Promise<void> {
    this.seen.clear()
    return Promise.resolve()
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Redis-backed
// ═══════════════════════════════════════════════════════════════════════════════

/** TTL for dedupe sets: 2 hours (covers long-running runs + buffer) */
const DEDUPE_SET_TTL_SECONDS = 2 * 60 * 60

/** Redis key prefix for dedupe sets */
const DEDUPE_KEY_PREFIX = 'harvester:dedupe:'

/**
 * Redis set commands the deduper needs. An ioredis client satisfies it.
 */
export interface DedupeRedis {
  sadd(key: string, ...members: string[]): Promise<number>
  expire(key: string, seconds: number): Promise<number>
  scard(key: string): Promise<number>
  del(key: string): Promise<number>
}

export class RedisRunDeduper implements Deduper {
  private readonly key: string

  constructor(
    private readonly redis: DedupeRedis,
    private readonly runId: string,
    private readonly ttlSeconds = DEDUPE_SET_TTL_SECONDS
  ) {
    this.key = `${DEDUPE_KEY_PREFIX}${runId}`
  }

  async checkAndAdd(url: string): Promise<boolean> {
    const member = dedupeKeyForUrl(url)

    try {
      // SADD returns 1 if new member added, 0 if already exists
      const added = await this.redis.sadd(this.key, member)

      if (added === 1) {
        await this.redis.expire(this.key, this.ttlSeconds)
      }

      return added === 0
    } catch (error) {
      // A missed duplicate is preferable to dropping the listing
      log.warn('Dedupe check failed', {
        runId: this.runId,
        ...sanitizeUrl(member),
        error: error instanceof Error ? error.message : String(error),
      })
      return false
    }
  }

  async count(): Promise<number> {
    try {
      return await this.redis.scard(this.key)
    } catch (error) {
      log.warn('Dedupe count failed', {
        runId: this.runId,
        error: error instanceof Error ? error.message : String(error),
      })
      return 0
    }
  }

  async cleanup(): Promise<void> {
    try {
      await this.redis.del(this.key)
    } catch (error) {
      log.warn('Failed to cleanup dedupe set', {
        runId: this.runId,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }
}
