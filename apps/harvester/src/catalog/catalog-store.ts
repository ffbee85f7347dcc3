/**
 * GPU Catalog Store
 *
 * Read-only reference data: known models, their memory variants and
 * benchmark scores, plus the model-name correction table. Loaded once
 * and injected into the extractor, validator and value ranking.
 */

import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { CatalogLoadError } from '../errors.js'
import { splitModelKey, withVram } from './model-key.js'
import type { CatalogEntry, CorrectionTable } from './types.js'

const log = loggers.catalog

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../data/gpu-catalog.json', import.meta.url))
export const DEFAULT_CORRECTIONS_PATH = fileURLToPath(new URL('../../data/model-corrections.json', import.meta.url))

const catalogFileSchema = z.object({
  version: z.number().int().positive(),
  entries: z
    .array(
      z.object({
        model: z.string().trim().min(1),
        vramGb: z.number().int().positive().optional(),
        benchmarkScore: z.number().nonnegative().optional(),
      })
    )
    .min(1),
})

const correctionsFileSchema = z.object({
  models: z.record(z.string().min(1)),
  withVram: z.record(z.string().min(1)).default({}),
})

export interface CatalogLoadOptions {
  catalogPath?: string
  correctionsPath?: string
}

export class CatalogStore {
  readonly corrections: CorrectionTable
  private readonly entryList: readonly CatalogEntry[]
  /** Exact keys, always with VRAM when the entry has one */
  private readonly keys = new Set<string>()
  /** base -> known VRAM sizes */
  private readonly families = new Map<string, Set<number>>()
  private readonly scores = new Map<string, number>()

  constructor(entries: readonly CatalogEntry[], corrections: CorrectionTable) {
    this.entryList = entries
    this.corrections = corrections

    for (const entry of entries) {
      const parts = splitModelKey(entry.model)
      const vramGb = parts.vramGb ?? entry.vramGb ?? null
      const key = withVram(parts.base, vramGb)

      this.keys.add(key)
      let sizes = this.families.get(parts.base)
      if (!sizes) {
        sizes = new Set()
        this.families.set(parts.base, sizes)
      }
      if (vramGb !== null) sizes.add(vramGb)
      if (entry.benchmarkScore !== undefined) this.scores.set(key, entry.benchmarkScore)
    }
  }

  /**
   * Load the catalog and correction table from JSON files.
   * Any read, parse or consistency failure is fatal for the run.
   */
  static async load(options: CatalogLoadOptions = {}): Promise<CatalogStore> {
    const catalogPath = options.catalogPath ?? DEFAULT_CATALOG_PATH
    const correctionsPath = options.correctionsPath ?? DEFAULT_CORRECTIONS_PATH

    const catalogRaw = await readJson(catalogPath)
    const correctionsRaw = await readJson(correctionsPath)

    const store = CatalogStore.fromData(catalogRaw, correctionsRaw, { catalogPath, correctionsPath })
    log.info('Catalog loaded', {
      entries: store.size,
      families: store.familyCount,
      corrections: Object.keys(store.corrections.models).length,
    })
    return store
  }

  /**
   * Build a store from already-parsed JSON values.
   */
  static fromData(
    catalogRaw: unknown,
    correctionsRaw: unknown,
    paths: { catalogPath: string; correctionsPath: string } = { catalogPath: '<memory>', correctionsPath: '<memory>' }
  ): CatalogStore {
    const catalog = catalogFileSchema.safeParse(catalogRaw)
    if (!catalog.success) {
      throw new CatalogLoadError(paths.catalogPath, describeIssues(catalog.error), catalog.error)
    }
    const corrections = correctionsFileSchema.safeParse(correctionsRaw)
    if (!corrections.success) {
      throw new CatalogLoadError(paths.correctionsPath, describeIssues(corrections.error), corrections.error)
    }

    const chained = findChainedCorrections(corrections.data)
    if (chained.length > 0) {
      throw new CatalogLoadError(paths.correctionsPath, `correction targets are also sources: ${chained.join(', ')}`)
    }

    return new CatalogStore(catalog.data.entries, corrections.data)
  }

  get size(): number {
    return this.keys.size
  }

  get familyCount(): number {
    return this.families.size
  }

  entries(): readonly CatalogEntry[] {
    return this.entryList
  }

  /** Distinct base names, in catalog order */
  bases(): string[] {
    return [...this.families.keys()]
  }

  /**
   * True when the key is catalogued as-is, or when its base is catalogued
   * with exactly that memory size.
   */
  isExactMatch(key: string): boolean {
    if (this.keys.has(key)) return true
    const { base, vramGb } = splitModelKey(key)
    return vramGb !== null && (this.families.get(base)?.has(vramGb) ?? false)
  }

  hasFamily(base: string): boolean {
    return this.families.has(base)
  }

  /** Known memory sizes for a base model, ascending. Empty when unknown. */
  knownVramSizes(base: string): number[] {
    const sizes = this.families.get(base)
    return sizes ? [...sizes].sort((a, b) => a - b) : []
  }

  benchmarkScore(key: string): number | undefined {
    const direct = this.scores.get(key)
    if (direct !== undefined) return direct

    const { base, vramGb } = splitModelKey(key)
    if (vramGb !== null) return undefined

    // A base key without VRAM gets the score of its only variant
    const sizes = this.knownVramSizes(base)
    return sizes.length === 1 ? this.scores.get(withVram(base, sizes[0] ?? null)) : undefined
  }
}

async function readJson(path: string): Promise<unknown> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new CatalogLoadError(path, error instanceof Error ? error.message : String(error), error)
  }
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new CatalogLoadError(path, 'invalid JSON', error)
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

function findChainedCorrections(table: CorrectionTable): string[] {
  const chained: string[] = []
  for (const target of Object.values(table.models)) {
    if (Object.prototype.hasOwnProperty.call(table.models, target)) chained.push(target)
  }
  for (const target of Object.values(table.withVram)) {
    if (Object.prototype.hasOwnProperty.call(table.withVram, target)) chained.push(target)
  }
  return chained
}
