/**
 * Run Summary
 *
 * Formats the post-run summary printed by the map command.
 */

import type { ApiErrorType, GeocodingStats, InputRow, ResultRow } from '../types'

export const FAILED_ROWS_PREVIEW = 10

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return `${text.slice(0, maxLength - 3)}...`
}

export function formatPercent(part: number, total: number): string {
  if (total === 0) return '0.0%'
  return `${((part / total) * 100).toFixed(1)}%`
}

/**
 * Short reason for a failure: "not found", or the provider error message.
 */
export function describeFailure(type: ApiErrorType, message: string): string {
  return type === 'not_found' ? 'not found' : `${type}: ${message}`
}

export function formatStats(stats: GeocodingStats, cancelled: boolean): string[] {
  const lines = [
    `   Total rows: ${stats.total}`,
    `   Geocoded: ${stats.successCount} (${formatPercent(stats.successCount, stats.total)})`,
    `   Failed: ${stats.failedCount}`
  ]
  if (cancelled || stats.pendingCount > 0) {
    lines.push(`   Not processed: ${stats.pendingCount}`)
  }
  return lines
}

/**
 * One line per failed row (1-based row numbers), limited to the preview size
 * unless `showAll` is set.
 */
export function formatFailedRows<R extends InputRow>(
  failed: readonly ResultRow<R>[],
  showAll: boolean
): string[] {
  const shown = showAll ? failed : failed.slice(0, FAILED_ROWS_PREVIEW)
  const lines = shown.map((row) => {
    const reason = row.failure ? describeFailure(row.failure.type, row.failure.message) : 'failed'
    return `   Row ${row.index + 1}: ${truncate(row.query, 60)} (${reason})`
  })
  const hidden = failed.length - shown.length
  if (hidden > 0) {
    lines.push(`   ... and ${hidden} more (use --all to list every failed row)`)
  }
  return lines
}
