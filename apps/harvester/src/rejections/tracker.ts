/**
 * Rejection Tracker
 *
 * Append-only log of every listing the run dropped, with per-category counts.
 * One tracker per run.
 */

import type { RejectionCategory, RejectionStage } from './categories.js'
import { REJECTION_LABELS } from './categories.js'

export interface RejectionRecord {
  title: string
  priceCents: number
  url: string
  /** Model the listing was attributed to, when extraction got that far */
  model?: string
  reason: string
  category: RejectionCategory
  categoryLabel: string
  stage: RejectionStage
}

export type RejectionInput = Omit<RejectionRecord, 'categoryLabel'>

export interface RejectionSummaryEntry {
  category: RejectionCategory
  label: string
  count: number
}

export class RejectionTracker {
  private readonly log: RejectionRecord[] = []
  private readonly counts = new Map<RejectionCategory, number>()

  record(input: RejectionInput): RejectionRecord {
    const record: RejectionRecord = { ...input, categoryLabel: REJECTION_LABELS[input.category] }
    this.log.push(record)
    this.counts.set(record.category, (this.counts.get(record.category) ?? 0) + 1)
    return record
  }

  /** Append another tracker's records (e.g. the filter's) after this one's */
  merge(other: RejectionTracker | readonly RejectionRecord[]): void {
    const records = other instanceof RejectionTracker ? other.records() : other
    for (const record of records) {
      this.log.push(record)
      this.counts.set(record.category, (this.counts.get(record.category) ?? 0) + 1)
    }
  }

  get size(): number {
    return this.log.length
  }

  records(): readonly RejectionRecord[] {
    return this.log
  }

  countsByCategory(): Partial<Record<RejectionCategory, number>> {
    const result: Partial<Record<RejectionCategory, number>> = {}
    for (const [category, count] of this.counts) result[category] = count
    return result
  }

  count(category: RejectionCategory): number {
    return this.counts.get(category) ?? 0
  }

  /**
   * Labelled counts, largest first. Ties keep the order categories were first seen.
   */
  summary(): RejectionSummaryEntry[] {
    return [...this.counts.entries()]
      .map(([category, count]) => ({ category, label: REJECTION_LABELS[category], count }))
      .sort((a, b) => b.count - a.count)
  }
}
