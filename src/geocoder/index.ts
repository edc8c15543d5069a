/**
 * Geocoder Module
 *
 * Provider clients that resolve query text to coordinates, plus helpers
 * over geocoded result rows.
 */

import { AddressMapperError } from '../errors'
import type {
  GeocodeClient,
  GeocodedRow,
  GeocoderConfig,
  InputRow,
  ResultRow
} from '../types'
import { createGoogleClient } from './google'
import { createNominatimClient } from './nominatim'

export { toRegionCode } from './country'
export { createGoogleClient, GOOGLE_GEOCODE_URL } from './google'
export { createNominatimClient, DEFAULT_USER_AGENT, NOMINATIM_BASE_URL } from './nominatim'
export { DEFAULT_MIN_INTERVAL_MS, RateLimiter, type RateLimiterOptions } from './rate-limiter'

export const DEFAULT_TIMEOUT_MS = 10_000

/**
 * Construct a client for the configured provider.
 * Build it once and pass it to every pipeline run.
 */
export function createGeocodeClient(config: GeocoderConfig): GeocodeClient {
  switch (config.provider) {
    case 'google': {
      const { apiKey } = config
      if (!apiKey) {
        throw new AddressMapperError(
          'GOOGLE_MAPS_API_KEY or GOOGLE_API_KEY environment variable required',
          'CONFIG_ERROR'
        )
      }
      return createGoogleClient({ ...config, apiKey })
    }
    case 'nominatim':
      return createNominatimClient(config)
  }
}

export function isGeocoded<R extends InputRow>(row: ResultRow<R>): row is GeocodedRow<R> {
  return row.status === 'Success' && row.latitude !== undefined && row.longitude !== undefined
}

/**
 * Filter to only geocoded rows (those with coordinates), preserving order.
 */
export function filterGeocoded<R extends InputRow>(rows: readonly ResultRow<R>[]): GeocodedRow<R>[] {
  return rows.filter((row): row is GeocodedRow<R> => isGeocoded(row))
}

/**
 * Count geocoded rows.
 */
export function countGeocoded(rows: readonly ResultRow[]): number {
  return filterGeocoded(rows).length
}

/**
 * Calculate the center point of geocoded rows. Rows without coordinates are ignored.
 */
export function calculateCenter(rows: readonly ResultRow[]): { lat: number; lng: number } | null {
  const geocoded = filterGeocoded(rows)

  if (geocoded.length === 0) {
    return null
  }

  const sumLat = geocoded.reduce((sum, r) => sum + r.latitude, 0)
  const sumLng = geocoded.reduce((sum, r) => sum + r.longitude, 0)

  return {
    lat: sumLat / geocoded.length,
    lng: sumLng / geocoded.length
  }
}
