/**
 * Model Validator
 *
 * Checks a canonical model key against the catalog. Pure: no I/O, no
 * state beyond the injected catalog.
 *
 * Outcomes:
 * - accepted: key is catalogued (including its memory size)
 * - accepted_without_vram: the base model is catalogued, the memory size is not
 * - rejected: LIKELY_TYPO when a catalogued model of the same brand and
 *   series is one or two edits away, UNKNOWN_MODEL otherwise
 */

import type { CatalogStore } from '../catalog/catalog-store.js'
import { splitModelKey, tierOf } from '../catalog/model-key.js'
import { normalizeModelName } from '../extractor/normalize.js'
import { levenshteinDistance, sharedCharacterCount } from '../utils/text-distance.js'

export type ValidationRejectReason = 'LIKELY_TYPO' | 'UNKNOWN_MODEL'

export type ValidationOutcome =
  | { status: 'accepted'; model: string }
  | { status: 'accepted_without_vram'; model: string; baseModel: string }
  | {
      status: 'rejected'
      reason: ValidationRejectReason
      message: string
      attemptedModel: string
      suggestion?: string
    }

/** Edit distance range treated as a typo */
const MIN_TYPO_DISTANCE = 1
const MAX_TYPO_DISTANCE = 2

/**
 * True when `candidate` looks like a misspelling of `known`.
 *
 * Two keys that both carry a memory size and disagree on it are different
 * products, never typos ("RTX 3060 8GB" vs "RTX 3060 12GB"). Otherwise the
 * bases must share brand and series and be 1-2 edits apart.
 */
export function isLikelyTypo(candidate: string, known: string): boolean {
  const a = splitModelKey(candidate)
  const b = splitModelKey(known)

  if (a.vramGb !== null && b.vramGb !== null && a.vramGb !== b.vramGb) return false
  if (a.base === b.base) return false

  const tierA = tierOf(a.base)
  const tierB = tierOf(b.base)
  if (!tierA || !tierB) return false
  if (tierA.brand !== tierB.brand || tierA.series !== tierB.series) return false

  const distance = levenshteinDistance(a.base, b.base)
  return distance >= MIN_TYPO_DISTANCE && distance <= MAX_TYPO_DISTANCE
}

export class ModelValidator {
  constructor(private readonly catalog: CatalogStore) {}

  validate(candidate: string): ValidationOutcome {
    const model = normalizeModelName(candidate, this.catalog.corrections)

    if (this.catalog.isExactMatch(model)) {
      return { status: 'accepted', model }
    }

    const { base } = splitModelKey(model)
    if (this.catalog.hasFamily(base)) {
      return { status: 'accepted_without_vram', model, baseModel: base }
    }

    const suggestion = this.closestTypoTarget(model)
    if (suggestion) {
      return {
        status: 'rejected',
        reason: 'LIKELY_TYPO',
        message: `Likely typo of ${suggestion}`,
        attemptedModel: model,
        suggestion,
      }
    }

    return {
      status: 'rejected',
      reason: 'UNKNOWN_MODEL',
      message: `Unknown model ${model}`,
      attemptedModel: model,
    }
  }

  /**
   * Nearest catalogued base by edit distance. Ties go to the base sharing
   * the most characters, so a transposition ("GTX 1018") lands on the
   * model with the same digits (GTX 1080) rather than the first one listed.
   */
  private closestTypoTarget(model: string): string | null {
    const { base } = splitModelKey(model)
    let best: { base: string; distance: number; shared: number } | null = null

    for (const known of this.catalog.bases()) {
      if (!isLikelyTypo(model, known)) continue
      const distance = levenshteinDistance(base, known)
      const shared = sharedCharacterCount(base, known)
      if (!best || distance < best.distance || (distance === best.distance && shared > best.shared)) {
        best = { base: known, distance, shared }
      }
    }
    return best?.base ?? null
  }
}
