import { describe, expect, it } from 'vitest'
import { canonicalizeUrl, dedupeKeyForUrl, getRegistrableDomain, resolveUrl } from '../utils/url.js'

describe('canonicalizeUrl', () => {
  it('drops tracking and search-position parameters', () => {
    expect(
      canonicalizeUrl('http://Market.Example.BG/ad/rtx-3060-ID1a2b.html?utm_source=x&search_reason=search&reason=y&b=2&a=1#gallery')
    ).toBe('https://market.example.bg/ad/rtx-3060-ID1a2b.html?a=1&b=2')
  })

  it('removes a trailing slash except on the root path', () => {
    expect(canonicalizeUrl('https://market.example.bg/ad/123/')).toBe('https://market.example.bg/ad/123')
    expect(canonicalizeUrl('https://market.example.bg/')).toBe('https://market.example.bg/')
  })
})

describe('dedupeKeyForUrl', () => {
  it('falls back to the trimmed text for unparseable URLs', () => {
    expect(dedupeKeyForUrl('  not a url ')).toBe('not a url')
  })
})

describe('resolveUrl', () => {
  it('resolves relative links against the page', () => {
    expect(resolveUrl('/ad/42', 'https://market.example.bg/search?page=2')).toBe('https://market.example.bg/ad/42')
  })

  it('rejects non-http links', () => {
    expect(resolveUrl('javascript:void(0)', 'https://market.example.bg/')).toBeNull()
  })
})

describe('getRegistrableDomain', () => {
  it('groups subdomains under the registrable domain', () => {
    expect(getRegistrableDomain('https://www.market.example.bg/ad/1')).toBe('example.bg')
    expect(getRegistrableDomain('https://m.market.co.uk/ad/1')).toBe('market.co.uk')
  })
})
