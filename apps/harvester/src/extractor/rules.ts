/**
 * Ordered model-matching rules
 *
 * Each rule is a pattern plus a builder producing raw model text for the
 * normalizer. Rules run against the uppercased title; the first match wins.
 */

export interface ModelRule {
  name: string
  pattern: RegExp
  build: (match: RegExpExecArray) => string | null
}

export interface RuleMatch {
  rule: string
  raw: string
  text: string
}

/** Board partners whose listings often drop the RTX/GTX prefix ("Gigabyte 1060") */
export const BOARD_VENDORS = [
  'NVIDIA',
  'GIGABYTE',
  'ASUS',
  'MSI',
  'ZOTAC',
  'EVGA',
  'PNY',
  'PALIT',
  'GAINWARD',
  'INNO3D',
  'KFA2',
  'GALAX',
  'COLORFUL',
  'MANLI',
] as const

// Words that only decorate a model name and get in the way of the vendor rule
const DECORATION_WORDS = /(?<![A-Z])(?:GEFORCE|RADEON)(?![A-Z])\s*/g

function joinSuffix(tier: string, suffix: string | undefined): string {
  return suffix ? `${tier} ${suffix}` : tier
}

/**
 * Bare tier numbers after a vendor name: 9xx and 1xxx are GTX, 2xxx-5xxx RTX.
 */
function vendorTierBrand(tier: string): 'GTX' | 'RTX' | null {
  const lead = tier.charAt(0)
  if (lead === '1' || lead === '9') return 'GTX'
  if (lead >= '2' && lead <= '5') return 'RTX'
  return null
}

export const MODEL_RULES: readonly ModelRule[] = [
  {
    name: 'rtx',
    pattern: /(?<![A-Z])RTX\s?(\d{4})(?:\s?(TI\s?SUPER|TI|SUPER)(?![A-Z]))?/,
    build: (m) => `RTX ${joinSuffix(m[1], m[2])}`,
  },
  {
    name: 'gtx',
    pattern: /(?<![A-Z])GTX\s?(\d{3,4})(?:\s?(TI|SUPER)(?![A-Z]))?/,
    build: (m) => `GTX ${joinSuffix(m[1], m[2])}`,
  },
  {
    name: 'vega',
    pattern: /(?<![A-Z])(?:RX\s?)?VEGA\s?(\d{2})(?!\d)/,
    build: (m) => `VEGA ${m[1]}`,
  },
  {
    name: 'rx',
    pattern: /(?<![A-Z])RX\s?(\d{3,4})(?:\s?(XTX|XT|GRE)(?![A-Z]))?/,
    build: (m) => `RX ${joinSuffix(m[1], m[2])}`,
  },
  {
    name: 'arc',
    pattern: /(?<![A-Z])ARC\s?([AB]\d{3})(?!\d)/,
    build: (m) => `ARC ${m[1]}`,
  },
  {
    name: 'vendor-number',
    pattern: new RegExp(`(?<![A-Z])(?:${BOARD_VENDORS.join('|')})\\s+(\\d{3,4})(?!\\d)(?:\\s?(TI|SUPER)(?![A-Z]))?`),
    build: (m) => {
      const brand = vendorTierBrand(m[1])
      return brand ? `${brand} ${joinSuffix(m[1], m[2])}` : null
    },
  },
]

/**
 * Run the rules against a listing title.
 */
export function matchModel(title: string, rules: readonly ModelRule[] = MODEL_RULES): RuleMatch | null {
  const text = title.toUpperCase().replace(DECORATION_WORDS, '')

  for (const rule of rules) {
    const match = rule.pattern.exec(text)
    if (!match) continue
    const raw = rule.build(match)
    if (raw) return { rule: rule.name, raw, text: match[0] }
  }
  return null
}
