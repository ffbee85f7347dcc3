/**
 * Catalog Types
 */

export interface CatalogEntry {
  /** Canonical key, optionally carrying a VRAM token ("RTX 3060 12GB") */
  model: string
  /** Memory size for entries whose key has no VRAM token */
  vramGb?: number
  /** Relative performance index used by value ranking */
  benchmarkScore?: number
}

/**
 * Correction table applied once during normalization.
 * `models` maps base names, `withVram` maps full keys.
 * Targets are fixed points: a target is never itself a source.
 */
export interface CorrectionTable {
  models: Readonly<Record<string, string>>
  withVram: Readonly<Record<string, string>>
}

export const EMPTY_CORRECTIONS: CorrectionTable = { models: {}, withVram: {} }
