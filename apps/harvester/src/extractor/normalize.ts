/**
 * Model name normalization
 *
 * Turns free-form model text ("GeForce RTX3060TI 12gb") into a canonical
 * key ("RTX 3060 TI 12GB"). The result is a fixed point:
 * normalizeModelName(normalizeModelName(x)) === normalizeModelName(x).
 */

import { withVram } from '../catalog/model-key.js'
import type { CorrectionTable } from '../catalog/types.js'

const BRAND_PREFIX = /^(?:AMD|NVIDIA|GEFORCE|RADEON|INTEL)(?![A-Z0-9])\s*/

/**
 * Compact (space-free) shapes per brand. Tier widths are fixed where the
 * brand allows it so the trailing VRAM digits split off correctly
 * ("RTX306012GB" -> 3060 + 12GB, "ARCA77016GB" -> A770 + 16GB).
 */
const COMPACT_SHAPES: readonly RegExp[] = [
  /^(RTX)(\d{4})((?:TI|SUPER)*)(?:(\d{1,2})GB)?$/,
  /^(GTX)(\d{3,4})((?:TI|SUPER)*)(?:(\d{1,2})GB)?$/,
  /^(?:RX)?(VEGA)(\d{2})()(?:(\d{1,2})GB)?$/,
  /^(RX)(\d{3,4})((?:XTX|XT|GRE|TI|SUPER)*)(?:(\d{1,2})GB)?$/,
  /^(ARC)([AB]\d{3})()(?:(\d{1,2})GB)?$/,
]

const SUFFIX_TOKEN = /XTX|XT|GRE|TI|SUPER/g
const VRAM_TOKEN = /^(\d{1,2})GB$/

export interface ParsedModelName {
  brand: string
  tier: string
  suffixes: string[]
  vramGb: number | null
}

export function stripBrandPrefixes(text: string): string {
  let current = text
  while (BRAND_PREFIX.test(current)) {
    current = current.replace(BRAND_PREFIX, '')
  }
  return current
}

/**
 * Parse model text into tokens. Returns null for text that does not have
 * a recognizable brand/tier shape.
 */
export function parseModelName(raw: string): ParsedModelName | null {
  const tokens = stripBrandPrefixes(raw.toUpperCase().trim()).split(/\s+/)

  // A VRAM token standing on its own is taken as is, so "RX 580 16GB"
  // never re-splits into 5801 + 6GB
  const last = tokens[tokens.length - 1]
  const separateVram = tokens.length > 1 && last !== undefined ? VRAM_TOKEN.exec(last) : null
  if (separateVram) {
    const parsed = matchCompactShape(tokens.slice(0, -1).join(''))
    if (parsed && parsed.vramGb === null) {
      return { ...parsed, vramGb: Number(separateVram[1]) }
    }
  }
  return matchCompactShape(tokens.join(''))
}

function matchCompactShape(compact: string): ParsedModelName | null {
  for (const shape of COMPACT_SHAPES) {
    const match = shape.exec(compact)
    if (!match) continue
    const [, brand, tier, suffixRun, vram] = match
    return {
      brand,
      tier,
      suffixes: suffixRun ? (suffixRun.match(SUFFIX_TOKEN) ?? []) : [],
      vramGb: vram ? Number(vram) : null,
    }
  }
  return null
}

export function normalizeModelName(raw: string, corrections: CorrectionTable): string {
  const parsed = parseModelName(raw)
  if (!parsed) {
    return stripBrandPrefixes(raw.toUpperCase().trim()).replace(/\s+/g, ' ')
  }

  const base = [parsed.brand, parsed.tier, ...parsed.suffixes].join(' ')
  const correctedBase = corrections.models[base] ?? base
  const key = withVram(correctedBase, parsed.vramGb)
  return corrections.withVram[key] ?? key
}
