/**
 * Relay identity renewal
 *
 * Asks an anonymizing relay for a fresh exit identity over its text control
 * protocol: AUTHENTICATE, then SIGNAL NEWNYM. Each command must be answered
 * with a "250" status line.
 */

import { createConnection, type Socket } from 'node:net'
import { loggers } from '../../config/logger.js'
import type { Clock, RelayControlConfig } from '../types.js'
import { systemClock } from '../types.js'

const log = loggers.proxy

const DEFAULT_CONTROL_TIMEOUT_MS = 5_000

export interface IdentityRenewer {
  /** Returns false when the relay refused or could not be reached */
  renew(): Promise<boolean>
}

export class RelayControlError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'RelayControlError'
  }
}

/** Quote a control-port argument, escaping backslashes and quotes */
function quoteArgument(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

/**
 * Minimal line-oriented client: one command at a time, each resolved by the
 * next complete reply line.
 */
class ControlConnection {
  private buffer = ''
  private pending: { resolve: (line: string) => void; reject: (error: Error) => void } | null = null
  private failure: Error | null = null

  private constructor(private readonly socket: Socket) {
    socket.setEncoding('utf8')
    socket.on('data', (chunk: string) => this.onData(chunk))
    socket.on('error', (error: Error) => this.fail(new RelayControlError(error.message, error)))
    socket.on('close', () => this.fail(new RelayControlError('Control connection closed')))
  }

  static open(host: string, port: number, timeoutMs: number): Promise<ControlConnection> {
    return new Promise((resolve, reject) => {
      const socket = createConnection({ host, port })
      socket.setTimeout(timeoutMs, () => {
        socket.destroy(new Error(`Control port timed out after ${timeoutMs}ms`))
      })
      const onError = (error: Error): void => reject(new RelayControlError(error.message, error))
      socket.once('error', onError)
      socket.once('connect', () => {
        socket.off('error', onError)
        resolve(new ControlConnection(socket))
      })
    })
  }

  send(command: string): Promise<string> {
    if (this.failure) return Promise.reject(this.failure)
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject }
      this.socket.write(`${command}\r\n`)
    })
  }

  close(): void {
    if (this.socket.writable) this.socket.end('QUIT\r\n')
    this.socket.destroy()
  }

  private onData(chunk: string): void {
    this.buffer += chunk
    let newline = this.buffer.indexOf('\n')
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '')
      this.buffer = this.buffer.slice(newline + 1)
      // "250-" lines continue a multi-line reply; "250 " ends it
      if (!/^\d{3}-/.test(line) && this.pending) {
        const { resolve } = this.pending
        this.pending = null
        resolve(line)
      }
      newline = this.buffer.indexOf('\n')
    }
  }

  private fail(error: Error): void {
    this.failure ??= error
    if (this.pending) {
      const { reject } = this.pending
      this.pending = null
      reject(error)
    }
  }
}

export interface RelayControlClientOptions {
  timeoutMs?: number
  clock?: Clock
}

export class RelayControlClient implements IdentityRenewer {
  private readonly timeoutMs: number
  private readonly clock: Clock

  constructor(
    private readonly config: RelayControlConfig,
    options: RelayControlClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONTROL_TIMEOUT_MS
    this.clock = options.clock ?? systemClock
  }

  async renew(): Promise<boolean> {
    const { host, port } = this.config
    let connection: ControlConnection | null = null
    try {
      connection = await ControlConnection.open(host, port, this.timeoutMs)

      const auth = this.config.password ? `AUTHENTICATE ${quoteArgument(this.config.password)}` : 'AUTHENTICATE'
      await this.expectOk(connection, auth, 'AUTHENTICATE')
      await this.expectOk(connection, 'SIGNAL NEWNYM', 'SIGNAL NEWNYM')
    } catch (error) {
      log.warn('Identity renewal failed', { host, port }, error)
      return false
    } finally {
      connection?.close()
    }

    log.info('Relay identity renewed', { host, port, settleMs: this.config.settleMs })
    await this.clock.sleep(this.config.settleMs)
    return true
  }

  private async expectOk(connection: ControlConnection, command: string, label: string): Promise<void> {
    const reply = await connection.send(command)
    if (!reply.startsWith('250')) {
      throw new RelayControlError(`${label} rejected: ${reply}`)
    }
  }
}
