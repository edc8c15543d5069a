import { describe, expect, it } from 'vitest'
import {
  AddressMapperError,
  getErrorMessage,
  ProviderError,
  RenderError,
  unwrapLookup,
  ValidationError
} from './errors'

describe('errors', () => {
  describe('unwrapLookup', () => {
    it('returns the coordinate on success', () => {
      const value = { latitude: 40.7508, longitude: -73.9961 }
      expect(unwrapLookup({ ok: true, value })).toEqual(value)
    })

    it('returns null when not found', () => {
      const lookup = { ok: false, error: { type: 'not_found', message: 'No results' } } as const
      expect(unwrapLookup(lookup, '00000, USA')).toBeNull()
    })

    it('throws a ProviderError for other failures', () => {
      const lookup = { ok: false, error: { type: 'quota', message: 'quota exceeded' } } as const
      let thrown: unknown
      try {
        unwrapLookup(lookup, '10001, USA')
      } catch (error) {
        thrown = error
      }
      expect(thrown).toBeInstanceOf(ProviderError)
      expect(thrown).toMatchObject({
        code: 'PROVIDER_ERROR',
        type: 'quota',
        message: 'quota exceeded',
        context: { type: 'quota', query: '10001, USA' }
      })
    })
  })

  describe('error classes', () => {
    it('ValidationError carries its details', () => {
      const error = new ValidationError('Missing required columns: zipcode', {
        missingColumns: ['zipcode']
      })
      expect(error).toBeInstanceOf(AddressMapperError)
      expect(error.code).toBe('VALIDATION_ERROR')
      expect(error.missingColumns).toEqual(['zipcode'])
      expect(error.invalidRows).toEqual([])
    })

    it('RenderError has a default message', () => {
      const error = new RenderError()
      expect(error.code).toBe('NO_DATA')
      expect(error.message).toBe('No valid coordinates found to display on the map.')
    })
  })

  describe('getErrorMessage', () => {
    it('reads Error messages and stringifies anything else', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom')
      expect(getErrorMessage(42)).toBe('42')
    })
  })
})
