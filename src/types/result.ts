/**
 * Result Types
 *
 * The result table built by the geocoding pipeline and read by the
 * marker encoder, the map renderer and the CSV export.
 */

import type { ApiErrorType } from './common'
import type { InputMode, InputRow } from './input'

export type GeocodeStatus = 'Pending' | 'Success' | 'Failed'

export interface RowFailure {
  readonly type: ApiErrorType
  readonly message: string
}

export interface ResultRow<R extends InputRow = InputRow> {
  /** Position in the input (0-based) */
  readonly index: number
  readonly input: R
  readonly query: string
  readonly status: GeocodeStatus
  readonly latitude?: number | undefined
  readonly longitude?: number | undefined
  readonly failure?: RowFailure | undefined
}

export type GeocodedRow<R extends InputRow = InputRow> = ResultRow<R> & {
  readonly status: 'Success'
  readonly latitude: number
  readonly longitude: number
}

export interface ResultSet<R extends InputRow = InputRow> {
  readonly mode: InputMode
  /** Original CSV header order */
  readonly columns: readonly string[]
  readonly rows: readonly ResultRow<R>[]
}

export interface GeocodingStats {
  readonly total: number
  readonly successCount: number
  readonly failedCount: number
  readonly pendingCount: number
}
