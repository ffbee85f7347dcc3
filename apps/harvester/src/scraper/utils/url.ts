/**
 * URL Utilities
 *
 * Canonical listing URLs are the dedupe key for a run:
 * 1. Enforce https (upgrade http)
 * 2. Lowercase hostname
 * 3. Remove tracking parameters (utm_*, fbclid, gclid, ref, source, campaign)
 *    and the marketplace's search-position markers
 * 4. Remove empty query parameters, sort the rest
 * 5. Remove fragment and trailing slash (except root path)
 */

import * as psl from 'psl'

const TRACKING_PARAMS = new Set([
  'fbclid',
  'gclid',
  'ref',
  'source',
  'campaign',
  'search_reason',
  'reason',
  'position',
])

/**
 * Canonicalize a listing URL so the same ad reached from different search
 * terms or result pages compares equal.
 *
 * @throws TypeError if the URL is invalid
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url)

  parsed.protocol = 'https:'
  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

/**
 * Canonical form when the URL parses, trimmed raw text otherwise.
 */
export function dedupeKeyForUrl(url: string): string {
  return isValidUrl(url) ? canonicalizeUrl(url) : url.trim()
}

export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Resolve a possibly relative link against the page it was found on.
 * Returns null for links that do not resolve to http(s).
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    const resolved = new URL(href, baseUrl)
    return resolved.protocol === 'http:' || resolved.protocol === 'https:' ? resolved.toString() : null
  } catch {
    return null
  }
}

/**
 * Extract the registrable domain (eTLD+1) from a URL.
 * Shared rate limits are scoped by registrable domain, so "www.example.bg"
 * and "m.example.bg" share one budget.
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  const parsedDomain = psl.parse(hostname)

  if (parsedDomain.error) {
    return hostname
  }
  return parsedDomain.domain || hostname
}
