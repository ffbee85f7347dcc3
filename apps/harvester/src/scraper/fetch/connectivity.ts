/**
 * Connectivity check
 *
 * Run-level precondition: the probe URL must be reachable through the
 * configured proxy. When the relay is down the run falls back to a direct
 * connection for its remainder; when nothing reaches the probe, the run fails
 * before any page is fetched.
 */

import { redactUrlCredentials } from '@gpuwatch/logger'
import { z } from 'zod'
import { loggers } from '../../config/logger.js'
import { ConnectivityError } from '../../errors.js'
import type { HttpClient } from '../types.js'
import { undiciHttpClient } from './http-fetcher.js'
import type { ProxyRotator } from './proxy.js'

const log = loggers.proxy

export const DEFAULT_PROBE_URL = 'https://api.ipify.org?format=json'
const DEFAULT_PROBE_TIMEOUT_MS = 15_000

export interface ConnectivityOptions {
  probeUrl?: string
  timeoutMs?: number
  httpClient?: HttpClient
}

export interface ConnectivityReport {
  via: 'proxy' | 'direct'
  /** Exit address reported by the probe, when it answers with one */
  exitIp: string | null
  /** True when the proxy failed and was disabled for the run */
  fellBack: boolean
}

const exitIpSchema = z.object({ ip: z.string().min(1) })

/** JSON probes answer {"ip": "..."}, plain-text probes with the address itself */
function parseExitIp(body: string): string | null {
  const trimmed = body.trim()
  if (trimmed.startsWith('{')) {
    let json: unknown
    try {
      json = JSON.parse(trimmed)
    } catch {
      return null
    }
    const parsed = exitIpSchema.safeParse(json)
    return parsed.success ? parsed.data.ip : null
  }
  return /^[0-9a-f.:]+$/i.test(trimmed) ? trimmed : null
}

async function probe(
  httpClient: HttpClient,
  probeUrl: string,
  timeoutMs: number,
  proxy: ProxyRotator | undefined
): Promise<string | null> {
  const selection = proxy?.next() ?? { proxyUrl: null }
  const signal = AbortSignal.timeout(timeoutMs)
  const response = await httpClient({
    url: probeUrl,
    headers: { Accept: 'application/json, text/plain' },
    signal,
    ...(selection.dispatcher ? { dispatcher: selection.dispatcher } : {}),
  })
  if (response.status < 200 || response.status >= 300) {
    throw new Error(`Probe answered HTTP ${response.status}`)
  }
  return parseExitIp(await response.text())
}

/**
 * Probe through the proxy (if any), falling back to direct.
 *
 * @throws ConnectivityError when neither route reaches the probe URL
 */
export async function checkConnectivity(
  proxy: ProxyRotator | undefined,
  options: ConnectivityOptions = {}
): Promise<ConnectivityReport> {
  const httpClient = options.httpClient ?? undiciHttpClient
  const probeUrl = options.probeUrl ?? DEFAULT_PROBE_URL
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS

  let proxyError: unknown = null
  if (proxy?.active) {
    try {
      const exitIp = await probe(httpClient, probeUrl, timeoutMs, proxy)
      log.info('Connectivity through proxy confirmed', { mode: proxy.mode, exitIp })
      return { via: 'proxy', exitIp, fellBack: false }
    } catch (error) {
      proxyError = error
      proxy.disable(error instanceof Error ? redactUrlCredentials(error.message) : 'probe failed')
    }
  }

  try {
    const exitIp = await probe(httpClient, probeUrl, timeoutMs, undefined)
    log.info('Direct connectivity confirmed', { exitIp })
    return { via: 'direct', exitIp, fellBack: proxyError !== null }
  } catch (error) {
    throw new ConnectivityError(`No connectivity to ${probeUrl}`, error)
  }
}
