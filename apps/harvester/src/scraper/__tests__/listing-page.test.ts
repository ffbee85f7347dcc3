import { describe, expect, it } from 'vitest'
import { parsePrice, SelectorListingParser } from '../parse/listing-page.js'

const PAGE_URL = 'https://market.example.bg/elektronika/q-rtx/?page=1'

function card(inner: string): string {
  return `<div data-cy="l-card">${inner}</div>`
}

const RESULTS_PAGE = `
<html><body>
  <div class="listing-grid">
    ${card(`
      <a href="/d/ad/rtx-3060-12gb-CID1-ID9aa.html"><h6>Gigabyte RTX 3060 12GB</h6></a>
      <p data-testid="ad-price">450 лв.</p>
      <p>Sofia - Today 10:15</p>
      <p>Works perfectly, never used for mining, original box included</p>
    `)}
    ${card(`
      <a href="https://market.example.bg/d/ad/rx-6600-CID1-ID9bb.html"><h4>  RX   6600 8GB </h4></a>
      <p data-testid="ad-price">1 250,50 лв.</p>
    `)}
    ${card(`
      <a href="/d/ad/gtx-1060-CID1-ID9cc.html"><h6>GTX 1060 6GB</h6></a>
      <p data-testid="ad-price">Договаряне</p>
    `)}
    ${card(`<p data-testid="ad-price">100 лв.</p>`)}
  </div>
  <a data-testid="pagination-forward" href="?page=2">next</a>
</body></html>`

describe('SelectorListingParser', () => {
  const parser = new SelectorListingParser()

  it('extracts title, price, absolute URL and description preview', () => {
    const { ads } = parser.parse(RESULTS_PAGE, PAGE_URL)

    expect(ads).toEqual([
      {
        title: 'Gigabyte RTX 3060 12GB',
        price: 450,
        url: 'https://market.example.bg/d/ad/rtx-3060-12gb-CID1-ID9aa.html',
        description: 'Works perfectly, never used for mining, original box included',
      },
      {
        title: 'RX 6600 8GB',
        price: 1250.5,
        url: 'https://market.example.bg/d/ad/rx-6600-CID1-ID9bb.html',
        description: '',
      },
      {
        title: 'GTX 1060 6GB',
        price: 0,
        url: 'https://market.example.bg/d/ad/gtx-1060-CID1-ID9cc.html',
        description: '',
      },
    ])
  })

  it('follows an enabled forward link', () => {
    expect(parser.parse(RESULTS_PAGE, PAGE_URL).hasNextPage).toBe(true)
  })

  it('stops at a disabled forward link', () => {
    const html = '<a data-testid="pagination-forward" class="pager--disabled" href="?page=3">next</a>'
    expect(parser.parse(html, PAGE_URL).hasNextPage).toBe(false)
  })

  it('reads "page X of Y" text when there is no forward link', () => {
    expect(parser.parse('<body><span>Страница 2 от 5</span></body>', PAGE_URL).hasNextPage).toBe(true)
    expect(parser.parse('<body><span>Страница 5 от 5</span></body>', PAGE_URL).hasNextPage).toBe(false)
  })

  it('accepts an arrow link as a last resort', () => {
    expect(parser.parse('<body><a href="?page=4">Следваща »</a></body>', PAGE_URL).hasNextPage).toBe(true)
    expect(parser.parse('<body><p>nothing here</p></body>', PAGE_URL).hasNextPage).toBe(false)
  })

  it('takes custom selectors', () => {
    const custom = new SelectorListingParser({
      card: 'li.offer',
      title: '.name',
      price: '.amount',
      description: '.teaser',
    })
    const html = `<ul><li class="offer"><a href="/ad/7"><span class="name">Arc A770 16GB</span></a>
      <span class="amount">600 лв</span><span class="teaser">Bought last year, still under warranty</span></li></ul>`

    expect(custom.parse(html, PAGE_URL).ads).toEqual([
      {
        title: 'Arc A770 16GB',
        price: 600,
        url: 'https://market.example.bg/ad/7',
        description: 'Bought last year, still under warranty',
      },
    ])
  })
})

describe('parsePrice', () => {
  it('reads thousands separators and decimal commas', () => {
    expect(parsePrice('1 250,50 лв.')).toBe(1250.5)
    expect(parsePrice('450 лв.')).toBe(450)
    expect(parsePrice('1250.00 лв')).toBe(1250)
    expect(parsePrice('2.400 лв.')).toBe(2400)
  })

  it('returns null without digits', () => {
    expect(parsePrice('Безплатно')).toBeNull()
  })
})
