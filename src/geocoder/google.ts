/**
 * Google Geocoding Client
 *
 * Convert query text to coordinates using the Google Geocoding API.
 */

import { handleHttpError, handleNetworkError, httpFetch, invalidResponseError } from '../http'
import type { GeocodeClient, GeocodeLookup, GeocoderConfig } from '../types'
import { toRegionCode } from './country'

export const GOOGLE_GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json'

interface GoogleGeocodingResponse {
  status: string
  results?: Array<{
    geometry?: {
      location?: {
        lat: number
        lng: number
      }
    }
    formatted_address?: string
  }>
  error_message?: string
}

function isGoogleResponse(data: unknown): data is GoogleGeocodingResponse {
  return typeof data === 'object' && data !== null && 'status' in data
}

export function createGoogleClient(
  config: Omit<GeocoderConfig, 'provider'> & { apiKey: string }
): GeocodeClient {
  const baseUrl = config.baseUrl ?? GOOGLE_GEOCODE_URL
  // Region bias is a soft preference, not a filter
  const regionCode = config.country ? toRegionCode(config.country) : null

  async function resolve(query: string, timeoutMs: number): Promise<GeocodeLookup> {
    const params = new URLSearchParams({ address: query, key: config.apiKey })
    if (regionCode) {
      params.set('region', regionCode)
    }

    try {
      const response = await httpFetch(`${baseUrl}?${params.toString()}`, {
        signal: AbortSignal.timeout(timeoutMs)
      })

      if (!response.ok) {
        return handleHttpError(response)
      }

      const data = await response.json()
      if (!isGoogleResponse(data)) {
        return invalidResponseError('missing status field')
      }

      switch (data.status) {
        case 'OVER_QUERY_LIMIT':
          return {
            ok: false,
            error: { type: 'quota', message: 'Google Geocoding API quota exceeded' }
          }
        case 'REQUEST_DENIED':
          return {
            ok: false,
            error: { type: 'auth', message: data.error_message ?? 'Request denied' }
          }
        case 'ZERO_RESULTS':
          return {
            ok: false,
            error: { type: 'not_found', message: `No results found for: ${query}` }
          }
      }

      if (data.status !== 'OK') {
        return invalidResponseError(`status ${data.status}`)
      }

      const location = data.results?.[0]?.geometry?.location
      if (!location) {
        return {
          ok: false,
          error: { type: 'not_found', message: `No results found for: ${query}` }
        }
      }

      return { ok: true, value: { latitude: location.lat, longitude: location.lng } }
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  return { provider: 'google', resolve }
}
