/**
 * Error types and classification
 *
 * Per-listing problems never throw; they become rejection records.
 * The classes here cover failures at page and run level.
 */

import { ZodError } from 'zod'

export type FetchErrorKind =
  | 'timeout' // Request exceeded the configured timeout
  | 'network' // DNS, connection refused/reset, proxy unreachable
  | 'rate_limited' // HTTP 429
  | 'blocked' // HTTP 403 or a captcha/challenge page
  | 'http' // Any other non-2xx status
  | 'aborted' // Cancelled by the caller

export interface FetchErrorOptions {
  url: string
  statusCode?: number
  attempts: number
  cause?: unknown
}

/**
 * Terminal failure of a page fetch after the retry policy gave up.
 * The orchestrator logs it and skips the page.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind
  readonly url: string
  readonly statusCode?: number
  readonly attempts: number

  constructor(kind: FetchErrorKind, message: string, options: FetchErrorOptions) {
    super(message, { cause: options.cause })
    this.name = 'FetchError'
    this.kind = kind
    this.url = options.url
    this.statusCode = options.statusCode
    this.attempts = options.attempts
  }
}

/** The GPU catalog or correction table could not be read or parsed. */
export class CatalogLoadError extends Error {
  readonly path: string

  constructor(path: string, message: string, cause?: unknown) {
    super(`Failed to load catalog from ${path}: ${message}`, { cause })
    this.name = 'CatalogLoadError'
    this.path = path
  }
}

/** Neither the configured proxy nor a direct connection reached the probe URL. */
export class ConnectivityError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ConnectivityError'
  }
}

export interface ConfigIssue {
  path: string
  message: string
}

/** Environment or CLI configuration failed validation. */
export class ConfigError extends Error {
  readonly issues: ConfigIssue[]

  constructor(issues: ConfigIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }

  static fromZod(error: ZodError): ConfigError {
    return new ConfigError(
      error.issues.map((issue) => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    )
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'config' // Bad environment or arguments
  | 'catalog' // Reference data unavailable
  | 'connectivity' // No route to the marketplace
  | 'fetch' // A page could not be fetched
  | 'internal' // Unexpected failure (bug)

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  exitCode: number
  isRetryable: boolean
  details?: Record<string, unknown>
}

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  CATALOG_UNAVAILABLE: 'CATALOG_UNAVAILABLE',
  CONNECTIVITY_FAILED: 'CONNECTIVITY_FAILED',
  FETCH_TIMEOUT: 'FETCH_TIMEOUT',
  FETCH_BLOCKED: 'FETCH_BLOCKED',
  FETCH_RATE_LIMITED: 'FETCH_RATE_LIMITED',
  FETCH_FAILED: 'FETCH_FAILED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

/** Exit codes used by the CLI */
export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  INVALID_INPUT: 2,
} as const

function fetchErrorCode(kind: FetchErrorKind): string {
  switch (kind) {
    case 'timeout':
      return ERROR_CODES.FETCH_TIMEOUT
    case 'blocked':
      return ERROR_CODES.FETCH_BLOCKED
    case 'rate_limited':
      return ERROR_CODES.FETCH_RATE_LIMITED
    case 'network':
    case 'http':
    case 'aborted':
      return ERROR_CODES.FETCH_FAILED
  }
}

/**
 * Classify an error for logging and for the CLI exit code.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ConfigError) {
    return {
      category: 'config',
      code: ERROR_CODES.CONFIGURATION_ERROR,
      message: error.message,
      exitCode: EXIT_CODES.INVALID_INPUT,
      isRetryable: false,
      details: { issues: error.issues },
    }
  }

  if (error instanceof ZodError) {
    return classifyError(ConfigError.fromZod(error))
  }

  if (error instanceof CatalogLoadError) {
    return {
      category: 'catalog',
      code: ERROR_CODES.CATALOG_UNAVAILABLE,
      message: error.message,
      exitCode: EXIT_CODES.FAILURE,
      isRetryable: false,
      details: { path: error.path },
    }
  }

  if (error instanceof ConnectivityError) {
    return {
      category: 'connectivity',
      code: ERROR_CODES.CONNECTIVITY_FAILED,
      message: error.message,
      exitCode: EXIT_CODES.FAILURE,
      isRetryable: true,
    }
  }

  if (error instanceof FetchError) {
    return {
      category: 'fetch',
      code: fetchErrorCode(error.kind),
      message: error.message,
      exitCode: EXIT_CODES.FAILURE,
      isRetryable: error.kind !== 'http' && error.kind !== 'aborted',
      details: { kind: error.kind, statusCode: error.statusCode, attempts: error.attempts },
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: error instanceof Error ? error.message : String(error),
    exitCode: EXIT_CODES.FAILURE,
    isRetryable: false,
  }
}
