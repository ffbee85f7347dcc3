/**
 * Structured logging helpers for ingestion runs.
 *
 * Every entry of a run carries the same envelope (run id, stage) and URLs
 * are logged as host/path/hash, never with their query string.
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@gpuwatch/logger'

export interface RunLogContext {
  runId: string
  stage: string
  term?: string
  page?: number
  [key: string]: unknown
}

type LogMeta = Record<string, unknown>

export interface RunLogger {
  debug(event: string, meta?: LogMeta): void
  info(event: string, meta?: LogMeta): void
  warn(event: string, meta?: LogMeta, err?: unknown): void
  error(event: string, meta?: LogMeta, err?: unknown): void
  child(extra: Partial<RunLogContext>): RunLogger
}

export function createRunLogger(base: ILogger, context: RunLogContext): RunLogger {
  const envelope = compact(context)

  const payload = (event: string, meta?: LogMeta): LogMeta => ({
    event_name: event,
    ...envelope,
    ...(meta ? compact(meta) : {}),
  })

  return {
    debug: (event, meta) => base.debug(event, payload(event, meta)),
    info: (event, meta) => base.info(event, payload(event, meta)),
    warn: (event, meta, err) => base.warn(event, payload(event, meta), err),
    error: (event, meta, err) => base.error(event, payload(event, meta), err),
    child: (extra) => createRunLogger(base, { ...context, ...compact(extra) }),
  }
}

export function sanitizeUrl(url?: string | null): {
  urlHost?: string
  urlPath?: string
  urlHash?: string
} {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return {
      urlHost: parsed.host,
      urlPath: parsed.pathname,
      urlHash: hashValue(`${parsed.host}${parsed.pathname}`),
    }
  } catch {
    return { urlHash: hashValue(url) }
  }
}

export function hashValue(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}

function compact(value: LogMeta): LogMeta {
  const next: LogMeta = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
