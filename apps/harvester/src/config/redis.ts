/**
 * Redis connection for shared run state
 *
 * Optional: only used when REDIS_URL is set, so several harvester
 * processes share one rate-limit window and one seen-URL set.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { redactUrlCredentials } from '@gpuwatch/logger'
import { loggers } from './logger.js'

const log = loggers.redis

/** Reconnect attempts after which logging drops to once a minute */
const CIRCUIT_BREAKER_ATTEMPTS = 20

export function redisOptions(): RedisOptions {
  let lastCircuitBreakerLog = 0

  return {
    maxRetriesPerRequest: 3,
    keepAlive: 10_000,
    connectTimeout: 10_000,
    commandTimeout: 30_000,
    enableOfflineQueue: true,
    lazyConnect: true,
    retryStrategy(times: number) {
      if (times > CIRCUIT_BREAKER_ATTEMPTS) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60_000) {
          lastCircuitBreakerLog = now
          log.error('Redis circuit breaker: prolonged outage', { attempts: times })
        }
        return 30_000
      }
      const delay = Math.min(times * 500, 30_000)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },
  }
}

export function createRedisClient(redisUrl: string): Redis {
  const client = new Redis(redisUrl, redisOptions())
  client.on('error', (err: Error) => {
    log.warn('Redis error', { connection: redactUrlCredentials(redisUrl), error: err.message })
  })
  return client
}
