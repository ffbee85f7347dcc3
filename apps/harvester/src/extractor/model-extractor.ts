/**
 * Model Extractor
 *
 * Title + description -> canonical model key with memory size.
 *
 * 1. Ordered rules find a model mention in the title
 * 2. The mention is normalized and corrected
 * 3. Memory size comes from the title, then the description
 * 4. Missing sizes are filled in when the catalog knows only one variant;
 *    several variants without a stated size is a rejection
 * 5. Implausible sizes and unknown bases are rejections
 */

import type { CatalogStore } from '../catalog/catalog-store.js'
import { splitModelKey, withVram } from '../catalog/model-key.js'
import type { ModelValidator } from '../validation/model-validator.js'
import { normalizeModelName } from './normalize.js'
import { matchModel, MODEL_RULES, type ModelRule } from './rules.js'
import { extractVram, type VramSource } from './vram.js'

export type ExtractionRejectReason =
  | 'NO_MODEL' // No rule matched the title
  | 'INVALID_VRAM' // Stated size impossible for the model family
  | 'MISSING_VRAM' // Several sizes exist and the listing names none
  | 'LIKELY_TYPO' // Unknown model close to a catalogued one
  | 'UNKNOWN_MODEL' // Unknown model

export type ExtractionResult =
  | {
      ok: true
      model: string
      baseModel: string
      vramGb: number | null
      vramSource: VramSource | 'catalog' | null
      rule: string
    }
  | {
      ok: false
      reason: ExtractionRejectReason
      message: string
      attemptedModel: string | null
    }

/**
 * A stated size is implausible when it is more than twice the largest or
 * less than half the smallest size the family ships with.
 */
export function isImplausibleVram(vramGb: number, knownSizes: readonly number[]): boolean {
  if (knownSizes.length === 0) return false
  const min = Math.min(...knownSizes)
  const max = Math.max(...knownSizes)
  return vramGb > max * 2 || vramGb * 2 < min
}

function formatSizes(sizes: readonly number[]): string {
  return sizes.map((size) => `${size}GB`).join(', ')
}

export class ModelExtractor {
  constructor(
    private readonly catalog: CatalogStore,
    private readonly validator: ModelValidator,
    private readonly rules: readonly ModelRule[] = MODEL_RULES
  ) {}

  extract(title: string, description = ''): ExtractionResult {
    const match = matchModel(title, this.rules)
    if (!match) {
      return { ok: false, reason: 'NO_MODEL', message: 'No GPU model found in title', attemptedModel: null }
    }

    const candidate = normalizeModelName(match.raw, this.catalog.corrections)
    const { base } = splitModelKey(candidate)
    const vram = extractVram(title, description)

    if (!this.catalog.hasFamily(base)) {
      return this.classifyUnknown(vram ? withVram(base, vram.vramGb) : base, match.rule, vram?.source ?? null)
    }

    const sizes = this.catalog.knownVramSizes(base)

    if (vram) {
      if (isImplausibleVram(vram.vramGb, sizes)) {
        return {
          ok: false,
          reason: 'INVALID_VRAM',
          message: `${vram.vramGb}GB is not a valid size for ${base} (known: ${formatSizes(sizes)})`,
          attemptedModel: withVram(base, vram.vramGb),
        }
      }
      const key = withVram(base, vram.vramGb)
      const model = this.catalog.corrections.withVram[key] ?? key
      return {
        ok: true,
        model,
        baseModel: splitModelKey(model).base,
        vramGb: vram.vramGb,
        vramSource: vram.source,
        rule: match.rule,
      }
    }

    if (sizes.length === 0) {
      return { ok: true, model: base, baseModel: base, vramGb: null, vramSource: null, rule: match.rule }
    }

    if (sizes.length === 1) {
      const [only] = sizes
      return {
        ok: true,
        model: withVram(base, only),
        baseModel: base,
        vramGb: only,
        vramSource: 'catalog',
        rule: match.rule,
      }
    }

    return {
      ok: false,
      reason: 'MISSING_VRAM',
      message: `${base} comes in ${formatSizes(sizes)}; listing does not state which`,
      attemptedModel: base,
    }
  }

  private classifyUnknown(attempted: string, rule: string, vramSource: VramSource | null): ExtractionResult {
    const outcome = this.validator.validate(attempted)
    switch (outcome.status) {
      case 'rejected':
        return {
          ok: false,
          reason: outcome.reason,
          message: outcome.message,
          attemptedModel: outcome.attemptedModel,
        }
      case 'accepted':
      case 'accepted_without_vram': {
        const { base, vramGb } = splitModelKey(outcome.model)
        return { ok: true, model: outcome.model, baseModel: base, vramGb, vramSource, rule }
      }
    }
  }
}
