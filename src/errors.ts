/**
 * Error Types
 *
 * Structural failures raised to the caller. Per-row geocoding failures are
 * never thrown: they come back as `Result` values and end up on the row.
 */

import type { ApiError, ApiErrorType, GeocodeLookup, Coordinate } from './types'

export class AddressMapperError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly context?: Readonly<Record<string, unknown>>
  ) {
    super(message)
    this.name = 'AddressMapperError'
  }
}

/**
 * Uploaded table is unusable: missing required columns or invalid cells.
 * Raised before any geocoding starts.
 */
export class ValidationError extends AddressMapperError {
  readonly missingColumns: readonly string[]
  readonly invalidRows: readonly number[]

  constructor(
    message: string,
    details: { missingColumns?: readonly string[]; invalidRows?: readonly number[] } = {}
  ) {
    super(message, 'VALIDATION_ERROR', details)
    this.name = 'ValidationError'
    this.missingColumns = details.missingColumns ?? []
    this.invalidRows = details.invalidRows ?? []
  }
}

export class ProviderError extends AddressMapperError {
  readonly type: ApiErrorType

  constructor(error: ApiError, query?: string) {
    super(error.message, 'PROVIDER_ERROR', { type: error.type, query })
    this.name = 'ProviderError'
    this.type = error.type
  }
}

/**
 * No successfully geocoded rows to draw. Exporting the status table may still proceed.
 */
export class RenderError extends AddressMapperError {
  constructor(message = 'No valid coordinates found to display on the map.') {
    super(message, 'NO_DATA')
    this.name = 'RenderError'
  }
}

/**
 * Unwrap a lookup, throwing on provider failure.
 * Returns null for not-found.
 */
export function unwrapLookup(lookup: GeocodeLookup, query?: string): Coordinate | null {
  if (lookup.ok) return lookup.value
  if (lookup.error.type === 'not_found') return null
  throw new ProviderError(lookup.error, query)
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
