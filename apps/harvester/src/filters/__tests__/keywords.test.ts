import { describe, expect, it } from 'vitest'
import { CatalogLoadError } from '../../errors.js'
import { KeywordMatcher, loadFilterKeywords, parseFilterKeywords } from '../keywords.js'

describe('KeywordMatcher', () => {
  it('matches case-insensitively at the start of a word', () => {
    const matcher = new KeywordMatcher(['риг', 'дефект'])

    expect(matcher.find('Карта ДЕФЕКТНА, без образ')).toBe('дефект')
    expect(matcher.find('Оригинална кутия')).toBeNull()
  })

  it('returns the first keyword in list order', () => {
    const matcher = new KeywordMatcher(['mining rig', 'rig'])

    expect(matcher.find('From my mining rig')).toBe('mining rig')
  })

  it('treats regex characters literally', () => {
    const matcher = new KeywordMatcher(['ek-wb (quantum)'])

    expect(matcher.find('block EK-WB (Quantum) vector')).toBe('ek-wb (quantum)')
    expect(matcher.find('ek-wb quantum')).toBeNull()
  })
})

describe('loadFilterKeywords', () => {
  it('loads every list from the bundled file', async () => {
    const keywords = await loadFilterKeywords()

    expect(Object.keys(keywords).sort()).toEqual([
      'coolingParts',
      'defective',
      'fullComputer',
      'mining',
      'suspicious',
      'waterCooling',
    ])
    expect(keywords.suspicious).toContain('спешно')
  })

  it('lists each keyword once', async () => {
    const keywords = await loadFilterKeywords()

    for (const list of Object.values(keywords)) {
      expect(new Set(list).size).toBe(list.length)
    }
  })

  it('rejects a file with missing lists', () => {
    expect(() => parseFilterKeywords({ mining: ['mining'] }, 'broken.json')).toThrow(CatalogLoadError)
  })

  it('reports a missing file', async () => {
    await expect(loadFilterKeywords('/nonexistent/filter-keywords.json')).rejects.toBeInstanceOf(CatalogLoadError)
  })
})
