/**
 * Proxy selection
 *
 * Three modes:
 * - none: direct connection
 * - relay: one fixed anonymizing relay; a new identity is requested over
 *   its control port when the marketplace blocks us
 * - rotating: round-robin over a proxy list; a block skips to the next one
 *
 * Proxies are dispatched through undici's ProxyAgent, one agent per proxy URL.
 */

import { ProxyAgent, type Dispatcher } from 'undici'
import { redactUrlCredentials } from '@gpuwatch/logger'
import { loggers } from '../../config/logger.js'
import type { ProxyConfig } from '../types.js'
import type { IdentityRenewer } from './identity-renewer.js'
import { RelayControlClient } from './identity-renewer.js'

const log = loggers.proxy

export interface ProxySelection {
  /** null for a direct connection */
  proxyUrl: string | null
  dispatcher?: Dispatcher
}

export type DispatcherFactory = (proxyUrl: string) => Dispatcher

const defaultDispatcherFactory: DispatcherFactory = (proxyUrl) => new ProxyAgent(proxyUrl)

export interface ProxyRotatorOptions {
  /** Overrides the control-port client built from the relay config */
  renewer?: IdentityRenewer
  dispatcherFactory?: DispatcherFactory
}

export class ProxyRotator {
  private readonly urls: string[]
  private readonly renewer: IdentityRenewer | null
  private readonly dispatcherFactory: DispatcherFactory
  private readonly agents = new Map<string, Dispatcher>()
  private cursor = 0
  private disabled = false

  constructor(
    private readonly config: ProxyConfig,
    options: ProxyRotatorOptions = {}
  ) {
    this.dispatcherFactory = options.dispatcherFactory ?? defaultDispatcherFactory

    switch (config.mode) {
      case 'none':
        this.urls = []
        this.renewer = null
        break
      case 'relay':
        this.urls = [config.url]
        this.renewer = options.renewer ?? (config.control ? new RelayControlClient(config.control) : null)
        break
      case 'rotating':
        if (config.urls.length === 0) {
          throw new RangeError('Rotating proxy mode needs at least one proxy URL')
        }
        this.urls = [...config.urls]
        this.renewer = null
        break
    }
  }

  get mode(): ProxyConfig['mode'] {
    return this.config.mode
  }

  /** True while requests go through a proxy */
  get active(): boolean {
    return !this.disabled && this.urls.length > 0
  }

  /**
   * Proxy for the next request. Rotating mode advances round-robin.
   */
  next(): ProxySelection {
    if (!this.active) return { proxyUrl: null }

    const proxyUrl = this.urls[this.cursor % this.urls.length]
    if (proxyUrl === undefined) return { proxyUrl: null }
    if (this.config.mode === 'rotating') this.cursor = (this.cursor + 1) % this.urls.length

    return { proxyUrl, dispatcher: this.agentFor(proxyUrl) }
  }

  /**
   * Get a different exit identity after a block.
   * Returns false when there is nothing to rotate (direct mode, relay without
   * a control port, or a failed renewal).
   */
  async rotateIdentity(): Promise<boolean> {
    if (!this.active) return false

    switch (this.config.mode) {
      case 'none':
        return false
      case 'relay':
        if (!this.renewer) return false
        return this.renewer.renew()
      case 'rotating':
        if (this.urls.length < 2) return false
        this.cursor = (this.cursor + 1) % this.urls.length
        log.info('Skipping to next proxy', { index: this.cursor })
        return true
    }
  }

  /**
   * Fall back to direct connections for the rest of the run.
   */
  disable(reason: string): void {
    if (this.disabled) return
    this.disabled = true
    log.warn('Proxy disabled, continuing with direct connection', {
      mode: this.config.mode,
      proxies: this.urls.map(redactUrlCredentials),
      reason,
    })
  }

  async close(): Promise<void> {
    const agents = [...this.agents.values()]
    this.agents.clear()
    await Promise.all(agents.map((agent) => agent.close()))
  }

  private agentFor(proxyUrl: string): Dispatcher {
    let agent = this.agents.get(proxyUrl)
    if (!agent) {
      agent = this.dispatcherFactory(proxyUrl)
      this.agents.set(proxyUrl, agent)
    }
    return agent
  }
}
