/**
 * Search Results Parser
 *
 * Turns a marketplace results page into RawAd listings and decides whether
 * another page follows. Selectors are configuration; the defaults fit the
 * classifieds layout the harvester was built against (cards with an h4/h6
 * title, a price paragraph and a forward pagination link).
 */

import * as cheerio from 'cheerio'
import { loggers } from '../../config/logger.js'
import type { ListingPage, ListingPageParser, RawAd } from '../types.js'
import { resolveUrl } from '../utils/url.js'

const log = loggers.parser

export interface ListingSelectors {
  /** One element per listing */
  card: string
  /** Link to the ad, searched inside the card unless the card is the link */
  link: string
  title: string
  price: string
  /** Candidates for a description preview; the first long, non-price text wins */
  description: string
  /** Forward pagination control */
  nextPage: string
}

export const DEFAULT_SELECTORS: ListingSelectors = {
  card: '[data-cy="l-card"]',
  link: 'a[href]',
  title: 'h4, h6',
  price: '[data-testid="ad-price"], p',
  description: 'p',
  nextPage: 'a[data-testid="pagination-forward"]',
}

/** Shortest text accepted as a description preview */
const MIN_DESCRIPTION_LENGTH = 20

const CURRENCY_MARKER = /лв|bgn|€|eur/i
const PAGE_OF_PATTERN = /[Сс]траница\s+(\d+)\s+от\s+(\d+)/
const NEXT_LABEL_PATTERN = /[→›»]|[Нн]апред|[Сс]ледваща/

/**
 * Parse a displayed price. Space (or dot) thousands separators and a comma
 * or dot decimal part are accepted.
 *
 * @example
 * parsePrice('1 250,50 лв.') // 1250.5
 * parsePrice('Договаряне') // null
 */
export function parsePrice(text: string): number | null {
  const match = /(\d{1,3}(?:[\s .]\d{3})+|\d+)(?:[.,](\d{1,2}))?(?!\d)/.exec(text)
  if (!match) return null

  const whole = (match[1] ?? '').replace(/[\s .]/g, '')
  const fraction = match[2] ?? ''
  const value = Number(fraction ? `${whole}.${fraction}` : whole)
  return Number.isFinite(value) ? value : null
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

interface CardTexts {
  title: string
  href: string | null
  priceTexts: string[]
  descriptionTexts: string[]
}

function toRawAd(card: CardTexts, pageUrl: string): RawAd | null {
  const title = cleanText(card.title)
  const url = card.href ? resolveUrl(card.href, pageUrl) : null
  if (!title || !url) return null

  const priceText = card.priceTexts.map(cleanText).find((text) => CURRENCY_MARKER.test(text) && parsePrice(text) !== null)
  const description =
    card.descriptionTexts
      .map(cleanText)
      .find((text) => text.length > MIN_DESCRIPTION_LENGTH && !CURRENCY_MARKER.test(text)) ?? ''

  // Listings without a price ("negotiable", "free") carry 0 and are rejected downstream
  const price = priceText === undefined ? 0 : (parsePrice(priceText) ?? 0)
  return { title, price, url, description }
}

export class SelectorListingParser implements ListingPageParser {
  private readonly selectors: ListingSelectors

  constructor(selectors: Partial<ListingSelectors> = {}) {
    this.selectors = { ...DEFAULT_SELECTORS, ...selectors }
  }

  parse(html: string, pageUrl: string): ListingPage {
    const $ = cheerio.load(html)
    const { selectors } = this
    const ads: RawAd[] = []
    let skipped = 0

    $(selectors.card).each((_, element) => {
      const card = $(element)
      const anchor = card.is('a') ? card : card.find(selectors.link).first()
      const ad = toRawAd(
        {
          title: card.find(selectors.title).first().text(),
          href: anchor.attr('href') ?? null,
          priceTexts: card
            .find(selectors.price)
            .toArray()
            .map((node) => $(node).text()),
          descriptionTexts: card
            .find(selectors.description)
            .toArray()
            .map((node) => $(node).text()),
        },
        pageUrl
      )
      if (ad) {
        ads.push(ad)
      } else {
        skipped += 1
      }
    })

    const hasNextPage = this.hasNextPage($)
    log.debug('Parsed results page', { ads: ads.length, skipped, hasNextPage })
    return { ads, hasNextPage }
  }

  /**
   * Forward control first, then "Страница X от Y", then any arrow link.
   * Unknown layouts count as the last page.
   */
  private hasNextPage($: cheerio.CheerioAPI): boolean {
    const next = $(this.selectors.nextPage).first()
    if (next.length > 0) {
      const disabled = (next.attr('class') ?? '').toLowerCase().includes('disabled') || next.attr('aria-disabled') === 'true'
      return !disabled && Boolean(next.attr('href'))
    }

    const pageOf = PAGE_OF_PATTERN.exec($('body').text())
    if (pageOf) {
      return Number(pageOf[1]) < Number(pageOf[2])
    }

    return $('a, button')
      .toArray()
      .some((node) => {
        const control = $(node)
        return NEXT_LABEL_PATTERN.test(control.text()) && Boolean(control.attr('href') || control.attr('onclick'))
      })
  }
}
