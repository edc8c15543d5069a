/**
 * CSV Export
 *
 * Export the result table: the original columns in their original order,
 * followed by the geocoding columns. One line per input row.
 */

import type { InputRow, ResultRow, ResultSet } from '../types'

const ADDRESS_RESULT_COLUMNS = ['full_address', 'latitude', 'longitude', 'geocoding_status'] as const
const ZIP_RESULT_COLUMNS = ['latitude', 'longitude', 'geocoding_status'] as const

/**
 * Escape a value for CSV (handle quotes and commas).
 */
export function escapeCSV(value: string | number | undefined | null): string {
  if (value === undefined || value === null) {
    return ''
  }

  const str = String(value)

  // If contains comma, newline, or quote, wrap in quotes
  if (str.includes(',') || str.includes('\n') || str.includes('"') || str.includes('\r')) {
    // Double any existing quotes
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Header of the exported table.
 * Result columns already present in the source are written once, at the end.
 */
export function exportColumns(results: ResultSet): string[] {
  const appended: readonly string[] =
    results.mode === 'address' ? ADDRESS_RESULT_COLUMNS : ZIP_RESULT_COLUMNS
  return [...results.columns.filter((c) => !appended.includes(c)), ...appended]
}

function resultValue(row: ResultRow<InputRow>, column: string): string | number | undefined {
  switch (column) {
    case 'full_address':
      return row.query
    case 'latitude':
      return row.latitude
    case 'longitude':
      return row.longitude
    case 'geocoding_status':
      return row.status
    default:
      return row.input.columns[column]
  }
}

/**
 * Export a result set to CSV.
 *
 * @returns CSV string with a header line and one line per row
 */
export function exportToCSV<R extends InputRow>(results: ResultSet<R>): string {
  const columns = exportColumns(results)
  const lines: string[] = [columns.map(escapeCSV).join(',')]

  for (const row of results.rows) {
    lines.push(columns.map((column) => escapeCSV(resultValue(row, column))).join(','))
  }

  return `${lines.join('\n')}\n`
}
