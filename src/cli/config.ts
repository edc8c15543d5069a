/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/address-mapper/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or ADDRESS_MAPPER_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { AddressMapperError } from '../errors'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Geocoding provider: nominatim or google */
  provider?: string | undefined
  /** User-Agent sent to Nominatim */
  userAgent?: string | undefined
  /** Country bias for lookups (name or ISO code) */
  country?: string | undefined
  /** Minimum delay between provider calls in milliseconds */
  delayMs?: number | undefined
  /** Per-request timeout in milliseconds */
  timeoutMs?: number | undefined
  /** Output directory for exports */
  outputDir?: string | undefined
  /** Export formats (csv,map) */
  formats?: string[] | undefined
  /** Title shown on the map page */
  mapTitle?: string | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

export type ConfigValue = string | number | string[]

/** Config keys that accept string values */
const STRING_KEYS = [
  'provider',
  'userAgent',
  'country',
  'outputDir',
  'mapTitle'
] as const satisfies readonly ConfigKey[]
/** Config keys that accept non-negative integer values */
const NUMBER_KEYS = ['delayMs', 'timeoutMs'] as const satisfies readonly ConfigKey[]
/** Config keys that accept array values */
const ARRAY_KEYS = ['formats'] as const satisfies readonly ConfigKey[]

type StringKey = (typeof STRING_KEYS)[number]
type NumberKey = (typeof NUMBER_KEYS)[number]
type ArrayKey = (typeof ARRAY_KEYS)[number]

export const VALID_PROVIDERS = ['nominatim', 'google'] as const
export const VALID_FORMATS = ['csv', 'map'] as const

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  provider: 'Geocoding provider: nominatim or google (default: nominatim)',
  userAgent: 'User-Agent for Nominatim requests (default: address-mapper)',
  country: 'Bias lookups towards a country, name or ISO code (e.g. US)',
  delayMs: 'Minimum delay between lookups in ms (default: 100)',
  timeoutMs: 'Per-lookup timeout in ms (default: 10000)',
  outputDir: 'Output directory for exports (default: ./output)',
  formats: 'Export formats (default: csv,map)',
  mapTitle: 'Title shown on the map page (default: Address Map)'
}

function isStringKey(key: string): key is StringKey {
  return STRING_KEYS.some((k) => k === key)
}

function isNumberKey(key: string): key is NumberKey {
  return NUMBER_KEYS.some((k) => k === key)
}

function isArrayKey(key: string): key is ArrayKey {
  return ARRAY_KEYS.some((k) => k === key)
}

/**
 * Get the type of a config key (derived from key arrays).
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (isNumberKey(key)) return 'number'
  if (isArrayKey(key)) return 'comma-separated'
  return 'string'
}

export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for address-mapper.
 * Uses ~/.config/address-mapper on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'address-mapper')
}

/**
 * Get the config file path.
 * Priority: configFile arg > ADDRESS_MAPPER_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.ADDRESS_MAPPER_CONFIG) {
    return process.env.ADDRESS_MAPPER_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep only known keys holding values of the right type.
 */
export function sanitizeConfig(raw: unknown): Config {
  const config: Config = {}
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return config
  }
  for (const [key, value] of Object.entries(raw)) {
    if (isStringKey(key) && typeof value === 'string') {
      config[key] = value
    } else if (isNumberKey(key) && typeof value === 'number' && Number.isInteger(value)) {
      config[key] = value
    } else if (isArrayKey(key) && Array.isArray(value)) {
      config[key] = value.filter((v): v is string => typeof v === 'string')
    } else if (key === 'updatedAt' && typeof value === 'string') {
      config.updatedAt = value
    }
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if file doesn't exist or can't be parsed.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch {
    return null
  }
  return sanitizeConfig(parsed)
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, `${JSON.stringify(withTimestamp, null, 2)}\n`)
}

function invalidValue(key: ConfigKey, value: string, expected: string): AddressMapperError {
  return new AddressMapperError(
    `Invalid value for ${key}: "${value}" (expected ${expected})`,
    'CONFIG_ERROR',
    { key, value }
  )
}

/**
 * Parse a string value into the appropriate type for a config key.
 * Throws on values the key can never accept.
 */
export function parseConfigValue(key: ConfigKey, value: string): ConfigValue {
  if (isNumberKey(key)) {
    const trimmed = value.trim()
    if (!/^\d+$/.test(trimmed)) {
      throw invalidValue(key, value, 'a non-negative integer')
    }
    return Number.parseInt(trimmed, 10)
  }
  if (isArrayKey(key)) {
    const formats = value
      .split(',')
      .map((v) => v.trim())
      .filter((v) => v.length > 0)
    const unknown = formats.filter((f) => !VALID_FORMATS.some((valid) => valid === f))
    if (formats.length === 0 || unknown.length > 0) {
      throw invalidValue(key, value, VALID_FORMATS.join(', '))
    }
    return formats
  }
  if (key === 'provider' && !VALID_PROVIDERS.some((p) => p === value)) {
    throw invalidValue(key, value, VALID_PROVIDERS.join(' or '))
  }
  return value
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.join(',')
  }
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return isStringKey(key) || isNumberKey(key) || isArrayKey(key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS, ...ARRAY_KEYS].sort()
}

/**
 * Return a copy of the config with one key set.
 */
export function withConfigValue(config: Config, key: ConfigKey, value: ConfigValue): Config {
  const next: Config = { ...config }
  if (isStringKey(key) && typeof value === 'string') {
    next[key] = value
  } else if (isNumberKey(key) && typeof value === 'number') {
    next[key] = value
  } else if (isArrayKey(key) && Array.isArray(value)) {
    next[key] = value
  } else {
    throw invalidValue(key, formatConfigValue(value), getConfigType(key))
  }
  return next
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(withConfigValue(config, key, value), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}
