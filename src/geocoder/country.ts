/**
 * Country bias helpers.
 */

import countries from 'i18n-iso-countries'
import en from 'i18n-iso-countries/langs/en.json'

countries.registerLocale(en)

/**
 * Convert a country name or code to a lowercase ISO 3166-1 alpha-2 code.
 * Accepts "United States", "USA", "US" or "us".
 */
export function toRegionCode(country: string): string | null {
  const trimmed = country.trim()
  if (!trimmed) return null

  if (/^[a-z]{2,3}$/i.test(trimmed) && countries.isValid(trimmed.toUpperCase())) {
    const alpha2 =
      trimmed.length === 2 ? trimmed.toUpperCase() : countries.alpha3ToAlpha2(trimmed.toUpperCase())
    return alpha2 ? alpha2.toLowerCase() : null
  }

  const code = countries.getAlpha2Code(trimmed, 'en')
  return code?.toLowerCase() ?? null
}
