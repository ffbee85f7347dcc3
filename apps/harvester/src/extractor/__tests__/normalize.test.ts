import { beforeAll, describe, expect, it } from 'vitest'
import { CatalogStore } from '../../catalog/catalog-store.js'
import type { CorrectionTable } from '../../catalog/types.js'
import { normalizeModelName, parseModelName } from '../normalize.js'

describe('normalizeModelName', () => {
  let corrections: CorrectionTable

  beforeAll(async () => {
    corrections = (await CatalogStore.load()).corrections
  })

  it.each([
    ['GeForce RTX3060TI 12gb', 'RTX 3060 TI 12GB'],
    ['AMD Radeon RX 7900', 'RX 7900 XT'],
    ['rx 7900 xtx 24gb', 'RX 7900 XTX 24GB'],
    ['rtx4070tisuper', 'RTX 4070 TI SUPER'],
    ['RTX 4070 Ti 16GB', 'RTX 4070 TI SUPER 16GB'],
    ['ARC A77016GB', 'ARC A770 16GB'],
    ['Intel Arc B580', 'ARC B580'],
    ['RX VEGA 64', 'VEGA 64'],
    ['RX5808GB', 'RX 580 8GB'],
    ['GTX 1080 Super', 'GTX 1080'],
    ['RTX 2090', 'RTX 2080 TI'],
    ['titan  xp', 'TITAN XP'],
    ['RX 580 16GB', 'RX 580 16GB'],
    ['rx 570 12gb', 'RX 570 12GB'],
    ['GTX 960 12GB', 'GTX 960 12GB'],
    ['RTX 3060 Ti Super 8GB', 'RTX 3060 TI 8GB'],
    ['RTX 3080 Ti Super 12GB', 'RTX 3080 TI 12GB'],
    ['GTX 1060 Super 6GB', 'GTX 1660 SUPER 6GB'],
    ['GTX 1640 Super', 'GTX 1650 SUPER'],
    ['RTX 2050 Super', 'RTX 2060 SUPER'],
    ['RX 5700 Super', 'RX 5700 XT'],
  ])('normalizes %s to %s', (raw, expected) => {
    expect(normalizeModelName(raw, corrections)).toBe(expected)
  })

  it('is idempotent', () => {
    const inputs = [
      'GeForce RTX3060TI 12gb',
      'AMD Radeon RX 7900',
      'RTX 4070 Ti 16GB',
      'rx vega 56 8g',
      'NVIDIA  GeForce GTX 1660 super',
      'something else',
    ]
    for (const input of inputs) {
      const once = normalizeModelName(input, corrections)
      expect(normalizeModelName(once, corrections)).toBe(once)
    }
  })

  it('never chains corrections', () => {
    for (const target of [...Object.values(corrections.models), ...Object.values(corrections.withVram)]) {
      expect(normalizeModelName(target, corrections)).toBe(target)
    }
  })
})

describe('parseModelName', () => {
  it('splits brand, tier, suffixes and VRAM', () => {
    expect(parseModelName('RTX 4070 TI SUPER 16GB')).toEqual({
      brand: 'RTX',
      tier: '4070',
      suffixes: ['TI', 'SUPER'],
      vramGb: 16,
    })
  })

  it('takes a separate size token as the size', () => {
    expect(parseModelName('RX 580 16GB')).toEqual({ brand: 'RX', tier: '580', suffixes: [], vramGb: 16 })
  })

  it('returns null for text without a model shape', () => {
    expect(parseModelName('Monitor 27"')).toBeNull()
  })
})
