import { beforeAll, describe, expect, it } from 'vitest'
import { CatalogStore } from '../../catalog/catalog-store.js'
import { ModelValidator } from '../../validation/model-validator.js'
import { isImplausibleVram, ModelExtractor } from '../model-extractor.js'

describe('ModelExtractor', () => {
  let extractor: ModelExtractor
  let validator: ModelValidator

  beforeAll(async () => {
    const catalog = await CatalogStore.load()
    validator = new ModelValidator(catalog)
    extractor = new ModelExtractor(catalog, validator)
  })

  it('keeps a stated size even when the catalog does not list it', () => {
    const result = extractor.extract('RTX3060TI 12GB')
    expect(result).toEqual({
      ok: true,
      model: 'RTX 3060 TI 12GB',
      baseModel: 'RTX 3060 TI',
      vramGb: 12,
      vramSource: 'title',
      rule: 'rtx',
    })
    expect(validator.validate('RTX 3060 TI 12GB')).toEqual({
      status: 'accepted_without_vram',
      model: 'RTX 3060 TI 12GB',
      baseModel: 'RTX 3060 TI',
    })
  })

  it('keeps a three-digit tier apart from a two-digit size', () => {
    expect(extractor.extract('Sapphire RX 580 16GB')).toEqual({
      ok: true,
      model: 'RX 580 16GB',
      baseModel: 'RX 580',
      vramGb: 16,
      vramSource: 'title',
      rule: 'rx',
    })
    expect(validator.validate('RX 580 16GB')).toEqual({
      status: 'accepted_without_vram',
      model: 'RX 580 16GB',
      baseModel: 'RX 580',
    })
    expect(extractor.extract('RX 570 12GB')).toMatchObject({ ok: true, model: 'RX 570 12GB' })
  })

  it('maps a SUPER on a card that never had one', () => {
    expect(extractor.extract('RTX 3060 Ti Super 8GB')).toMatchObject({ ok: true, model: 'RTX 3060 TI 8GB' })
    expect(extractor.extract('GTX 1060 Super 6GB')).toMatchObject({ ok: true, model: 'GTX 1660 SUPER 6GB' })
  })

  it('resolves a bare vendor number', () => {
    const result = extractor.extract('Gigabyte 1060 6gb')
    expect(result).toMatchObject({ ok: true, model: 'GTX 1060 6GB', rule: 'vendor-number' })
  })

  it('corrects the name and fills in the only known size', () => {
    expect(extractor.extract('RX 7900')).toMatchObject({
      ok: true,
      model: 'RX 7900 XT 20GB',
      vramGb: 20,
      vramSource: 'catalog',
    })
  })

  it('takes the size from the description', () => {
    expect(extractor.extract('Intel Arc B580', '12GB VRAM')).toMatchObject({
      ok: true,
      model: 'ARC B580 12GB',
      vramSource: 'description',
    })
  })

  it('maps an unofficial variant to the official one', () => {
    expect(extractor.extract('RTX 4070 Ti 16GB')).toMatchObject({
      ok: true,
      model: 'RTX 4070 TI SUPER 16GB',
      baseModel: 'RTX 4070 TI SUPER',
    })
  })

  it('does not mistake a warranty for memory', () => {
    expect(extractor.extract('GTX 1060 3GB, 3г гаранция')).toMatchObject({ ok: true, model: 'GTX 1060 3GB' })
    expect(extractor.extract('GTX 1060', 'Гаранция 2г')).toMatchObject({ ok: false, reason: 'MISSING_VRAM' })
  })

  it('rejects a multi-variant model without a size', () => {
    expect(extractor.extract('RTX 3060 Gaming OC')).toEqual({
      ok: false,
      reason: 'MISSING_VRAM',
      message: 'RTX 3060 comes in 8GB, 12GB; listing does not state which',
      attemptedModel: 'RTX 3060',
    })
  })

  it('rejects an implausible size', () => {
    expect(extractor.extract('GTX 1650 32GB')).toEqual({
      ok: false,
      reason: 'INVALID_VRAM',
      message: '32GB is not a valid size for GTX 1650 (known: 4GB)',
      attemptedModel: 'GTX 1650 32GB',
    })
  })

  it('classifies an unknown model close to a catalogued one as a typo', () => {
    expect(extractor.extract('GTX 1018 6GB')).toEqual({
      ok: false,
      reason: 'LIKELY_TYPO',
      message: 'Likely typo of GTX 1050',
      attemptedModel: 'GTX 1018 6GB',
    })
  })

  it('rejects a model far from anything catalogued', () => {
    expect(extractor.extract('RTX 9999')).toMatchObject({ ok: false, reason: 'UNKNOWN_MODEL' })
  })

  it('rejects titles without a model', () => {
    expect(extractor.extract('Продавам монитор')).toEqual({
      ok: false,
      reason: 'NO_MODEL',
      message: 'No GPU model found in title',
      attemptedModel: null,
    })
  })
})

describe('isImplausibleVram', () => {
  it('flags sizes far outside the family range', () => {
    expect(isImplausibleVram(32, [4])).toBe(true)
    expect(isImplausibleVram(8, [24])).toBe(true)
    expect(isImplausibleVram(12, [8])).toBe(false)
    expect(isImplausibleVram(16, [])).toBe(false)
  })
})
