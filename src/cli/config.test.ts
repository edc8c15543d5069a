/**
 * Tests for CLI Configuration
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { AddressMapperError } from '../errors'
import {
  formatConfigValue,
  getConfigPath,
  getConfigType,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  sanitizeConfig,
  saveConfig,
  setConfigValue,
  unsetConfigValue,
  withConfigValue
} from './config'

describe('config', () => {
  let tempDir: string
  let configPath: string
  let originalEnv: string | undefined

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'address-mapper-config-test-'))
    configPath = join(tempDir, 'config.json')
    originalEnv = process.env.ADDRESS_MAPPER_CONFIG
    delete process.env.ADDRESS_MAPPER_CONFIG
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
    if (originalEnv !== undefined) {
      process.env.ADDRESS_MAPPER_CONFIG = originalEnv
    } else {
      delete process.env.ADDRESS_MAPPER_CONFIG
    }
  })

  describe('getConfigPath', () => {
    it('returns explicit config file path when provided', () => {
      expect(getConfigPath('/custom/path/config.json')).toBe('/custom/path/config.json')
    })

    it('returns env var path when set', () => {
      process.env.ADDRESS_MAPPER_CONFIG = '/env/config.json'
      expect(getConfigPath()).toBe('/env/config.json')
    })

    it('returns default XDG path when no override', () => {
      expect(getConfigPath()).toContain(join('.config', 'address-mapper', 'config.json'))
    })

    it('explicit path takes precedence over env var', () => {
      process.env.ADDRESS_MAPPER_CONFIG = '/env/config.json'
      expect(getConfigPath('/explicit/config.json')).toBe('/explicit/config.json')
    })
  })

  describe('loadConfig', () => {
    it('returns null for non-existent file', async () => {
      expect(await loadConfig(configPath)).toBeNull()
    })

    it('loads valid config file', async () => {
      await writeFile(configPath, JSON.stringify({ country: 'US' }))
      expect(await loadConfig(configPath)).toEqual({ country: 'US' })
    })

    it('returns null for invalid JSON', async () => {
      await writeFile(configPath, 'not valid json')
      expect(await loadConfig(configPath)).toBeNull()
    })

    it('loads all config fields', async () => {
      const fullConfig = {
        provider: 'google',
        userAgent: 'test-agent',
        country: 'United States',
        delayMs: 1000,
        timeoutMs: 5000,
        outputDir: './output',
        formats: ['csv', 'map'],
        mapTitle: 'Households',
        updatedAt: '2025-01-01T00:00:00.000Z'
      }
      await writeFile(configPath, JSON.stringify(fullConfig))
      expect(await loadConfig(configPath)).toEqual(fullConfig)
    })

    it('drops unknown keys and mistyped values', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ country: 'US', delayMs: 'fast', homeCountry: 'NZ', formats: ['csv', 3] })
      )
      expect(await loadConfig(configPath)).toEqual({ country: 'US', formats: ['csv'] })
    })
  })

  describe('sanitizeConfig', () => {
    it('returns an empty config for non-objects', () => {
      expect(sanitizeConfig(null)).toEqual({})
      expect(sanitizeConfig([1, 2])).toEqual({})
      expect(sanitizeConfig('config')).toEqual({})
    })

    it('rejects fractional numbers', () => {
      expect(sanitizeConfig({ timeoutMs: 1.5 })).toEqual({})
    })
  })

  describe('saveConfig', () => {
    it('saves config to file with a timestamp', async () => {
      await saveConfig({ country: 'US' }, configPath)
      const saved: unknown = JSON.parse(await readFile(configPath, 'utf-8'))
      expect(saved).toEqual({ country: 'US', updatedAt: expect.any(String) })
    })

    it('creates parent directories', async () => {
      const nestedPath = join(tempDir, 'nested', 'dir', 'config.json')
      await saveConfig({ mapTitle: 'Stores' }, nestedPath)
      expect(existsSync(nestedPath)).toBe(true)
    })
  })

  describe('setConfigValue', () => {
    it('sets a new value in empty config', async () => {
      await setConfigValue('provider', 'google', configPath)
      const config = await loadConfig(configPath)
      expect(config?.provider).toBe('google')
    })

    it('preserves other values when setting', async () => {
      await saveConfig({ country: 'US', userAgent: 'test-agent' }, configPath)
      await setConfigValue('delayMs', 1000, configPath)
      const config = await loadConfig(configPath)
      expect(config?.country).toBe('US')
      expect(config?.userAgent).toBe('test-agent')
      expect(config?.delayMs).toBe(1000)
    })

    it('handles array values', async () => {
      await setConfigValue('formats', ['csv'], configPath)
      const config = await loadConfig(configPath)
      expect(config?.formats).toEqual(['csv'])
    })
  })

  describe('withConfigValue', () => {
    it('does not mutate the original config', () => {
      const original = { country: 'US' }
      const next = withConfigValue(original, 'country', 'CA')
      expect(original.country).toBe('US')
      expect(next.country).toBe('CA')
    })

    it('rejects a value of the wrong type', () => {
      expect(() => withConfigValue({}, 'delayMs', 'slow')).toThrow(AddressMapperError)
    })
  })

  describe('unsetConfigValue', () => {
    it('removes a value', async () => {
      await saveConfig({ country: 'US', provider: 'google' }, configPath)
      await unsetConfigValue('country', configPath)
      const config = await loadConfig(configPath)
      expect(config?.country).toBeUndefined()
      expect(config?.provider).toBe('google')
    })

    it('works on a missing file', async () => {
      await unsetConfigValue('country', configPath)
      expect(await loadConfig(configPath)).toEqual({ updatedAt: expect.any(String) })
    })
  })

  describe('parseConfigValue', () => {
    it('parses number keys', () => {
      expect(parseConfigValue('delayMs', '250')).toBe(250)
      expect(parseConfigValue('timeoutMs', ' 5000 ')).toBe(5000)
    })

    it('rejects non-integer numbers', () => {
      expect(() => parseConfigValue('delayMs', '-5')).toThrow(
        'Invalid value for delayMs: "-5" (expected a non-negative integer)'
      )
      expect(() => parseConfigValue('timeoutMs', '1.5')).toThrow(AddressMapperError)
    })

    it('parses formats as a comma-separated list', () => {
      expect(parseConfigValue('formats', 'csv, map')).toEqual(['csv', 'map'])
    })

    it('rejects unknown formats', () => {
      expect(() => parseConfigValue('formats', 'csv,pdf')).toThrow(
        'Invalid value for formats: "csv,pdf" (expected csv, map)'
      )
    })

    it('accepts known providers only', () => {
      expect(parseConfigValue('provider', 'nominatim')).toBe('nominatim')
      expect(() => parseConfigValue('provider', 'bing')).toThrow(
        'Invalid value for provider: "bing" (expected nominatim or google)'
      )
    })

    it('keeps string values as-is', () => {
      expect(parseConfigValue('mapTitle', 'North Region')).toBe('North Region')
    })
  })

  describe('formatConfigValue', () => {
    it('joins arrays with commas', () => {
      expect(formatConfigValue(['csv', 'map'])).toBe('csv,map')
    })

    it('stringifies scalars', () => {
      expect(formatConfigValue(100)).toBe('100')
      expect(formatConfigValue('US')).toBe('US')
    })
  })

  describe('config keys', () => {
    it('validates keys', () => {
      expect(isValidConfigKey('provider')).toBe(true)
      expect(isValidConfigKey('updatedAt')).toBe(false)
      expect(isValidConfigKey('homeCountry')).toBe(false)
    })

    it('lists keys alphabetically', () => {
      expect(getValidConfigKeys()).toEqual([
        'country',
        'delayMs',
        'formats',
        'mapTitle',
        'outputDir',
        'provider',
        'timeoutMs',
        'userAgent'
      ])
    })

    it('reports key types for help output', () => {
      expect(getConfigType('delayMs')).toBe('number')
      expect(getConfigType('formats')).toBe('comma-separated')
      expect(getConfigType('country')).toBe('string')
    })
  })
})
