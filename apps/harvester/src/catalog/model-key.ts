/**
 * Canonical model key helpers
 *
 * A key is "<BRAND> <TIER>[ <SUFFIX>...][ <N>GB]", e.g. "RTX 4070 TI SUPER 16GB".
 * The base is the key without its VRAM token.
 */

export const BRAND_TOKENS = ['RTX', 'GTX', 'RX', 'ARC', 'VEGA'] as const
export type BrandToken = (typeof BRAND_TOKENS)[number]

/** Memory sizes a consumer GPU actually ships with */
export const VALID_VRAM_SIZES: ReadonlySet<number> = new Set([2, 3, 4, 6, 8, 10, 11, 12, 16, 20, 24, 32, 48])

const VRAM_TOKEN = /^(\d{1,2})GB$/
const TIER_PATTERN = /^(RTX|GTX|RX|ARC|VEGA) ([AB]?)(\d+)/

export interface ModelKeyParts {
  base: string
  vramGb: number | null
}

export interface ModelTier {
  brand: BrandToken
  /** Leading numeric tier: "30" for 3060, "9" for 980, "B5" for B580 */
  series: string
  /** Full tier token: "3060", "B580" */
  number: string
}

export function splitModelKey(key: string): ModelKeyParts {
  const tokens = key.trim().split(/\s+/)
  const last = tokens[tokens.length - 1]
  const match = tokens.length > 1 && last !== undefined ? VRAM_TOKEN.exec(last) : null
  if (match) {
    return { base: tokens.slice(0, -1).join(' '), vramGb: Number(match[1]) }
  }
  return { base: tokens.join(' '), vramGb: null }
}

export function withVram(base: string, vramGb: number | null): string {
  return vramGb === null ? base : `${base} ${vramGb}GB`
}

function isBrandToken(value: string): value is BrandToken {
  return BRAND_TOKENS.some((brand) => brand === value)
}

export function tierOf(key: string): ModelTier | null {
  const match = TIER_PATTERN.exec(key)
  if (!match) return null
  const [, brand, letter, digits] = match
  if (!isBrandToken(brand)) return null
  const lead = digits.length >= 4 ? digits.slice(0, 2) : digits.slice(0, 1)
  return { brand, series: `${letter}${lead}`, number: `${letter}${digits}` }
}
