/**
 * Nominatim Client
 *
 * Free-text search against the OpenStreetMap Nominatim API.
 * Usage policy: identify with a User-Agent, at most one request per second
 * on the public instance (use --delay to slow the pipeline down).
 */

import { handleHttpError, handleNetworkError, httpFetch, invalidResponseError } from '../http'
import type { GeocodeClient, GeocodeLookup, GeocoderConfig } from '../types'
import { toRegionCode } from './country'

export const NOMINATIM_BASE_URL = 'https://nominatim.openstreetmap.org'
export const DEFAULT_USER_AGENT = 'address-mapper'

interface NominatimPlace {
  lat?: string
  lon?: string
  display_name?: string
}

export function createNominatimClient(config: Omit<GeocoderConfig, 'provider'> = {}): GeocodeClient {
  const baseUrl = (config.baseUrl ?? NOMINATIM_BASE_URL).replace(/\/+$/, '')
  const userAgent = config.userAgent ?? DEFAULT_USER_AGENT
  const regionCode = config.country ? toRegionCode(config.country) : null

  async function resolve(query: string, timeoutMs: number): Promise<GeocodeLookup> {
    const params = new URLSearchParams({ q: query, format: 'jsonv2', limit: '1' })
    if (regionCode) {
      params.set('countrycodes', regionCode)
    }

    try {
      const response = await httpFetch(`${baseUrl}/search?${params.toString()}`, {
        headers: { 'User-Agent': userAgent, Accept: 'application/json' },
        signal: AbortSignal.timeout(timeoutMs)
      })

      if (!response.ok) {
        return handleHttpError(response)
      }

      const data = await response.json()
      if (!Array.isArray(data)) {
        return invalidResponseError('expected an array of places')
      }

      const place: NominatimPlace | undefined = data[0]
      if (!place) {
        return { ok: false, error: { type: 'not_found', message: `No results found for: ${query}` } }
      }

      const latitude = Number.parseFloat(place.lat ?? '')
      const longitude = Number.parseFloat(place.lon ?? '')
      if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
        return invalidResponseError(`unparseable coordinates for: ${query}`)
      }

      return { ok: true, value: { latitude, longitude } }
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  return { provider: 'nominatim', resolve }
}
