/**
 * VRAM extraction from listing text
 *
 * Looks for "<n> GB" style tokens in the title first, then the description.
 * Bulgarian listings also write memory as "ГБ", "G" or "Г"; the same "г"
 * abbreviates "години" in warranty phrases ("3г гаранция"), so matches
 * that sit inside a warranty phrase are skipped.
 */

import { VALID_VRAM_SIZES } from '../catalog/model-key.js'

export type VramSource = 'title' | 'description'

export interface VramMatch {
  vramGb: number
  source: VramSource
  /** Matched text, e.g. "12 GB" */
  text: string
}

// JS \b only knows ASCII, so word edges are spelled out for Cyrillic text
const EDGE_BEFORE = '(?<![\\p{L}\\p{N}])'
const EDGE_AFTER = '(?![\\p{L}\\p{N}])'

/** In priority order: an explicit GB beats a bare G anywhere in the text */
const VRAM_PATTERNS: readonly RegExp[] = ['GB', 'ГБ', 'G', 'Г'].map(
  (unit) => new RegExp(`${EDGE_BEFORE}(\\d{1,2})\\s?${unit}${EDGE_AFTER}`, 'giu')
)

const WARRANTY_PATTERN =
  /(\d{1,2})\s?г\.?\s*(?:гаранция|години|год)|(?:гаранция|години)\s*(\d{1,2})\s?г/giu

interface Span {
  start: number
  end: number
}

function warrantySpans(text: string): Span[] {
  return [...text.matchAll(WARRANTY_PATTERN)].map((match) => ({
    start: match.index ?? 0,
    end: (match.index ?? 0) + match[0].length,
  }))
}

function overlaps(start: number, end: number, spans: readonly Span[]): boolean {
  return spans.some((span) => start < span.end && span.start < end)
}

/**
 * Find the first plausible memory size in a piece of text.
 */
export function findVram(text: string): { vramGb: number; text: string } | null {
  if (!text) return null
  const excluded = warrantySpans(text)

  for (const pattern of VRAM_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0
      if (overlaps(start, start + match[0].length, excluded)) continue
      const size = Number(match[1])
      if (VALID_VRAM_SIZES.has(size)) {
        return { vramGb: size, text: match[0] }
      }
    }
  }
  return null
}

export function extractVram(title: string, description = ''): VramMatch | null {
  const fromTitle = findVram(title)
  if (fromTitle) return { ...fromTitle, source: 'title' }

  const fromDescription = findVram(description)
  if (fromDescription) return { ...fromDescription, source: 'description' }

  return null
}
