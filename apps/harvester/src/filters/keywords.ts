/**
 * Keyword lists
 *
 * Loaded from data/filter-keywords.json. Matching is case-insensitive and a
 * keyword must start at a word boundary, so "дефект" matches "дефектна" but
 * "риг" does not match "оригинал".
 */

import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { CatalogLoadError } from '../errors.js'
import type { KeywordCategory } from '../rejections/categories.js'

export const DEFAULT_KEYWORDS_PATH = fileURLToPath(new URL('../../data/filter-keywords.json', import.meta.url))

const keywordList = z.array(z.string().trim().min(1))

const filterKeywordsSchema = z.object({
  mining: keywordList,
  waterCooling: keywordList,
  coolingParts: keywordList,
  defective: keywordList,
  fullComputer: keywordList,
  /** Urgency and promotional wording that makes a low price suspicious */
  suspicious: keywordList,
})

export type FilterKeywords = z.infer<typeof filterKeywordsSchema>

export const CATEGORY_KEYWORD_KEYS: Record<KeywordCategory, keyof FilterKeywords> = {
  MINING: 'mining',
  WATER_COOLING_PARTS: 'waterCooling',
  COOLING_PARTS: 'coolingParts',
  DEFECTIVE: 'defective',
  FULL_COMPUTER: 'fullComputer',
}

export function parseFilterKeywords(raw: unknown, path = '<memory>'): FilterKeywords {
  const parsed = filterKeywordsSchema.safeParse(raw)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new CatalogLoadError(path, detail, parsed.error)
  }
  return parsed.data
}

export async function loadFilterKeywords(path: string = DEFAULT_KEYWORDS_PATH): Promise<FilterKeywords> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new CatalogLoadError(path, error instanceof Error ? error.message : String(error), error)
  }
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new CatalogLoadError(path, 'invalid JSON', error)
  }
  return parseFilterKeywords(raw, path)
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Finds the first keyword of a list in a text, in list order.
 */
export class KeywordMatcher {
  private readonly patterns: Array<{ keyword: string; pattern: RegExp }>

  constructor(keywords: readonly string[]) {
    this.patterns = keywords.map((keyword) => ({
      keyword,
      pattern: new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}`, 'iu'),
    }))
  }

  find(text: string): string | null {
    for (const { keyword, pattern } of this.patterns) {
      if (pattern.test(text)) return keyword
    }
    return null
  }
}
