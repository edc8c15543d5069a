/**
 * Geocoder Types
 *
 * Types for geocoding providers and their results.
 */

import type { Result } from './common'

export type GeocodeProvider = 'nominatim' | 'google'

export interface Coordinate {
  readonly latitude: number
  readonly longitude: number
}

/**
 * Outcome of a single provider lookup.
 * A `not_found` error means the provider answered without a match; any other
 * error type is a provider failure (network, timeout, quota, bad payload).
 */
export type GeocodeLookup = Result<Coordinate>

/**
 * A client for one external geocoding service.
 * Construct once and reuse: implementations hold no per-call state.
 */
export interface GeocodeClient {
  readonly provider: GeocodeProvider | 'custom'
  resolve(query: string, timeoutMs: number): Promise<GeocodeLookup>
}

export interface GeocoderConfig {
  readonly provider: GeocodeProvider
  /** Required by Google */
  readonly apiKey?: string | undefined
  /** Required by Nominatim's usage policy */
  readonly userAgent?: string | undefined
  /** Country name or ISO code used to bias results */
  readonly country?: string | undefined
  /** Override the provider's base URL (self-hosted Nominatim) */
  readonly baseUrl?: string | undefined
}
