import { beforeAll, describe, expect, it } from 'vitest'
import { CatalogStore } from '../../catalog/catalog-store.js'
import { isLikelyTypo, ModelValidator } from '../model-validator.js'

describe('ModelValidator', () => {
  let validator: ModelValidator

  beforeAll(async () => {
    validator = new ModelValidator(await CatalogStore.load())
  })

  it('accepts a catalogued key', () => {
    expect(validator.validate('RTX 3060 12GB')).toEqual({ status: 'accepted', model: 'RTX 3060 12GB' })
  })

  it('accepts a known base without its size', () => {
    expect(validator.validate('RTX 3060')).toEqual({
      status: 'accepted_without_vram',
      model: 'RTX 3060',
      baseModel: 'RTX 3060',
    })
  })

  it('normalizes before checking', () => {
    expect(validator.validate('Radeon RX 7900')).toEqual({
      status: 'accepted_without_vram',
      model: 'RX 7900 XT',
      baseModel: 'RX 7900 XT',
    })
  })

  it('suggests the closest catalogued model for a typo', () => {
    expect(validator.validate('RTX 3061 12GB')).toEqual({
      status: 'rejected',
      reason: 'LIKELY_TYPO',
      message: 'Likely typo of RTX 3060',
      attemptedModel: 'RTX 3061 12GB',
      suggestion: 'RTX 3060',
    })
  })

  it('prefers the model with the same digits when distances tie', () => {
    expect(validator.validate('GTX 1018')).toEqual({
      status: 'rejected',
      reason: 'LIKELY_TYPO',
      message: 'Likely typo of GTX 1080',
      attemptedModel: 'GTX 1018',
      suggestion: 'GTX 1080',
    })
  })

  it('rejects an unknown model', () => {
    expect(validator.validate('RTX 9999 8GB')).toEqual({
      status: 'rejected',
      reason: 'UNKNOWN_MODEL',
      message: 'Unknown model RTX 9999 8GB',
      attemptedModel: 'RTX 9999 8GB',
    })
  })
})

describe('isLikelyTypo', () => {
  it('treats a different memory size as a different product', () => {
    expect(isLikelyTypo('RTX 3060 8GB', 'RTX 3060 12GB')).toBe(false)
  })

  it('detects a transposed tier number', () => {
    expect(isLikelyTypo('GTX 1018', 'GTX 1080')).toBe(true)
  })

  it('requires the same brand and series', () => {
    expect(isLikelyTypo('RX 3060', 'RTX 3060')).toBe(false)
    expect(isLikelyTypo('RTX 4060', 'RTX 3060')).toBe(false)
  })

  it('does not flag identical bases', () => {
    expect(isLikelyTypo('GTX 1080', 'GTX 1080 8GB')).toBe(false)
  })
})
