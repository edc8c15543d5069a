/**
 * Input Module
 *
 * Parse an uploaded CSV into typed rows, checking the required columns for
 * the chosen mode before anything is geocoded.
 */

import { parse } from 'csv-parse/sync'
import { getErrorMessage, ValidationError } from '../errors'
import type { AddressRow, InputMode, InputRow, InputTable, ZipRow } from '../types'

export const ADDRESS_COLUMNS = ['account_id', 'street', 'city', 'state', 'zipcode'] as const
export const ZIP_COLUMNS = ['zipcode', 'no_of_households'] as const

export const REQUIRED_COLUMNS: Record<InputMode, readonly string[]> = {
  address: ADDRESS_COLUMNS,
  zip: ZIP_COLUMNS
}

const MAX_REPORTED_PROBLEMS = 5

interface RawTable {
  readonly columns: string[]
  readonly records: Record<string, string>[]
}

/**
 * Parse CSV text into a header list and one record per data row.
 * Cells are trimmed; blank lines are skipped; short rows are padded with empty cells.
 * Column names must be unique, since cells are stored by name.
 */
export function parseCSV(content: string): RawTable {
  let lines: string[][]
  try {
    lines = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true
    })
  } catch (error) {
    throw new ValidationError(`Could not parse CSV: ${getErrorMessage(error)}`)
  }

  const [header, ...body] = lines
  if (!header || header.every((h) => h === '')) {
    throw new ValidationError('Input file is empty: expected a header row')
  }

  const duplicates = header.filter((column, i) => header.indexOf(column) !== i)
  if (duplicates.length > 0) {
    const names = [...new Set(duplicates)].map((c) => (c === '' ? '(blank)' : c))
    throw new ValidationError(`Duplicate column names: ${names.join(', ')}`)
  }

  const records = body.map((cells) => {
    const record: Record<string, string> = {}
    header.forEach((column, i) => {
      record[column] = cells[i] ?? ''
    })
    return record
  })

  return { columns: header, records }
}

/**
 * List required columns for a mode that the header lacks, in canonical order.
 */
export function findMissingColumns(columns: readonly string[], mode: InputMode): string[] {
  const present = new Set(columns)
  return REQUIRED_COLUMNS[mode].filter((c) => !present.has(c))
}

/**
 * Throw a ValidationError when any required column is missing.
 */
export function validateColumns(columns: readonly string[], mode: InputMode): void {
  const missing = findMissingColumns(columns, mode)
  if (missing.length > 0) {
    throw new ValidationError(`Missing required columns: ${missing.join(', ')}`, {
      missingColumns: missing
    })
  }
}

/**
 * Pick the mode whose required columns are all present.
 * Address mode wins when both match.
 */
export function detectMode(columns: readonly string[]): InputMode {
  const missingAddress = findMissingColumns(columns, 'address')
  if (missingAddress.length === 0) return 'address'

  const missingZip = findMissingColumns(columns, 'zip')
  if (missingZip.length === 0) return 'zip'

  const closest = missingZip.length < missingAddress.length ? missingZip : missingAddress
  throw new ValidationError(
    `Could not detect input mode. Address mode needs: ${ADDRESS_COLUMNS.join(', ')}. ` +
      `ZIP mode needs: ${ZIP_COLUMNS.join(', ')}`,
    { missingColumns: closest }
  )
}

function parseHouseholdCount(value: string): number | null {
  if (!/^\d+$/.test(value)) return null
  const count = Number.parseInt(value, 10)
  return Number.isSafeInteger(count) ? count : null
}

function toAddressRow(record: Record<string, string>): AddressRow {
  return {
    mode: 'address',
    accountId: record.account_id ?? '',
    street: record.street ?? '',
    city: record.city ?? '',
    state: record.state ?? '',
    zipcode: record.zipcode ?? '',
    columns: record
  }
}

function toZipRow(record: Record<string, string>, householdCount: number): ZipRow {
  return {
    mode: 'zip',
    zipcode: record.zipcode ?? '',
    householdCount,
    columns: record
  }
}

/**
 * Validate cell values and build typed rows.
 * Row numbers in errors are 1-based data rows (the header is not counted).
 */
function toRows(records: readonly Record<string, string>[], mode: InputMode): InputRow[] {
  const rows: InputRow[] = []
  const problems: string[] = []
  const invalidRows: number[] = []

  records.forEach((record, i) => {
    const rowNumber = i + 1
    const rowProblems: string[] = []

    for (const column of REQUIRED_COLUMNS[mode]) {
      if (!record[column]) {
        rowProblems.push(`empty ${column}`)
      }
    }

    let householdCount: number | null = null
    if (mode === 'zip' && record.no_of_households) {
      householdCount = parseHouseholdCount(record.no_of_households)
      if (householdCount === null) {
        rowProblems.push(
          `no_of_households "${record.no_of_households}" is not a non-negative integer`
        )
      }
    }

    if (rowProblems.length > 0) {
      invalidRows.push(rowNumber)
      problems.push(`row ${rowNumber}: ${rowProblems.join(', ')}`)
      return
    }

    rows.push(mode === 'zip' ? toZipRow(record, householdCount ?? 0) : toAddressRow(record))
  })

  if (problems.length > 0) {
    const shown = problems.slice(0, MAX_REPORTED_PROBLEMS).join('; ')
    const more =
      problems.length > MAX_REPORTED_PROBLEMS
        ? ` (and ${problems.length - MAX_REPORTED_PROBLEMS} more)`
        : ''
    throw new ValidationError(`Invalid data in ${invalidRows.length} row(s): ${shown}${more}`, {
      invalidRows
    })
  }

  return rows
}

/**
 * Read CSV content into a typed input table.
 *
 * @param content CSV text with a header row
 * @param mode Input mode, or 'auto' to detect it from the header
 * @throws ValidationError for missing columns or invalid cells
 */
export function readInputTable(content: string, mode: InputMode | 'auto' = 'auto'): InputTable {
  const { columns, records } = parseCSV(content)
  const resolvedMode = mode === 'auto' ? detectMode(columns) : mode

  validateColumns(columns, resolvedMode)

  return {
    mode: resolvedMode,
    columns,
    rows: toRows(records, resolvedMode)
  }
}
