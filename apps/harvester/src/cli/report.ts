/**
 * Run report rendering for the CLI (text and JSON)
 */

import { formatCents } from '../filters/stats.js'
import type { IngestRunResult } from '../pipeline/types.js'
import { modelPriceStats, type ValueEntry } from '../value/value.js'

export const TOP_VALUE_ENTRIES = 10

export function formatRunReport(result: IngestRunResult, ranking: readonly ValueEntry[]): string[] {
  const { metrics } = result
  const lines: string[] = []

  lines.push(`Run ${result.runId}: ${result.success ? 'completed' : 'failed'}${result.stopped ? ' (stopped)' : ''}`)
  if (result.error) {
    lines.push(`Error: ${result.error}`)
  }
  lines.push(
    `Pages: ${metrics.pagesFetched} fetched, ${metrics.pagesFailed} failed; ` +
      `listings: ${metrics.adsSeen} seen, ${metrics.duplicates} duplicates`
  )
  if (result.filterStats) {
    lines.push(`Kept ${result.filterStats.totalKept} of ${result.filterStats.totalInput} after filtering`)
  }

  const stats = [...modelPriceStats(result.observations)].sort(([a], [b]) => a.localeCompare(b))
  if (stats.length > 0) {
    lines.push('', 'Models:')
    for (const [model, s] of stats) {
      lines.push(
        `  ${model}: ${s.count} listings, min ${formatCents(s.minCents)}, ` +
          `median ${formatCents(s.medianCents)}, max ${formatCents(s.maxCents)}`
      )
    }
  }

  if (result.rejectionSummary.length > 0) {
    lines.push('', 'Rejections:')
    for (const entry of result.rejectionSummary) {
      lines.push(`  ${entry.label}: ${entry.count}`)
    }
  }

  if (ranking.length > 0) {
    lines.push('', 'Best value:')
    ranking.slice(0, TOP_VALUE_ENTRIES).forEach((entry, index) => {
      lines.push(
        `  ${index + 1}. ${entry.model}: ${entry.valuePerUnit} points per unit at ${formatCents(entry.bestPriceCents)}`
      )
    })
  }

  return lines
}

/**
 * Plain-object form of a run result (Maps become objects).
 */
export function toJsonReport(result: IngestRunResult, ranking: readonly ValueEntry[]): Record<string, unknown> {
  return {
    runId: result.runId,
    success: result.success,
    stopped: result.stopped,
    ...(result.error ? { error: result.error } : {}),
    ...(result.connectivity ? { connectivity: result.connectivity } : {}),
    metrics: result.metrics,
    filterStats: result.filterStats,
    observations: Object.fromEntries(result.observations),
    rejectionSummary: result.rejectionSummary,
    rejections: result.rejections,
    ranking,
  }
}
