/**
 * Run Settings
 *
 * Merges CLI flags, the config file and built-in defaults into the settings
 * for one map run. Priority: CLI flag → config → default.
 */

import { AddressMapperError } from '../errors'
import { DEFAULT_MIN_INTERVAL_MS, DEFAULT_TIMEOUT_MS } from '../geocoder/index'
import { DEFAULT_TITLE } from '../export/index'
import type { GeocodeProvider, GeocoderConfig } from '../types'
import type { CLIArgs, ModeOption } from './args'
import { type Config, VALID_FORMATS, VALID_PROVIDERS } from './config'

export type ExportFormat = (typeof VALID_FORMATS)[number]

export const DEFAULT_OUTPUT_DIR = './output'
export const CSV_FILENAME = 'geocoded_addresses.csv'
export const MAP_FILENAME = 'map.html'

export interface MapSettings {
  readonly mode: ModeOption
  readonly outputDir: string
  readonly formats: readonly ExportFormat[]
  readonly geocoder: GeocoderConfig
  readonly delayMs: number
  readonly timeoutMs: number
  readonly title: string
}

function configError(message: string): AddressMapperError {
  return new AddressMapperError(message, 'CONFIG_ERROR')
}

export function parseProvider(value: string | undefined): GeocodeProvider {
  if (value === undefined) return 'nominatim'
  const provider = VALID_PROVIDERS.find((p) => p === value.toLowerCase())
  if (!provider) {
    throw configError(`Unknown provider: ${value}. Valid providers: ${VALID_PROVIDERS.join(', ')}`)
  }
  return provider
}

export function parseFormats(values: readonly string[] | undefined): ExportFormat[] {
  if (values === undefined) return [...VALID_FORMATS]
  const formats: ExportFormat[] = []
  for (const value of values) {
    if (value === '') continue
    const format = VALID_FORMATS.find((f) => f === value.toLowerCase())
    if (!format) {
      throw configError(`Unknown format: ${value}. Valid formats: ${VALID_FORMATS.join(', ')}`)
    }
    if (!formats.includes(format)) formats.push(format)
  }
  if (formats.length === 0) {
    throw configError('No output formats selected')
  }
  return formats
}

function nonNegative(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback
  if (!Number.isInteger(value) || value < 0) {
    throw configError(`${name} must be a non-negative integer, got ${value}`)
  }
  return value
}

/**
 * Resolve the settings for a map run.
 * The Google key is read from GOOGLE_MAPS_API_KEY, then GOOGLE_API_KEY.
 */
export function resolveMapSettings(
  args: CLIArgs,
  config: Config | null,
  env: NodeJS.ProcessEnv = process.env
): MapSettings {
  const provider = parseProvider(args.provider ?? config?.provider)
  const timeoutMs = nonNegative('timeout', args.timeoutMs ?? config?.timeoutMs, DEFAULT_TIMEOUT_MS)
  if (timeoutMs === 0) {
    throw configError('timeout must be greater than 0')
  }

  return {
    mode: args.mode,
    outputDir: args.outputDir ?? config?.outputDir ?? DEFAULT_OUTPUT_DIR,
    formats: parseFormats(args.formats ?? config?.formats),
    geocoder: {
      provider,
      apiKey: env.GOOGLE_MAPS_API_KEY || env.GOOGLE_API_KEY || undefined,
      userAgent: args.userAgent ?? config?.userAgent,
      country: args.country ?? config?.country
    },
    delayMs: nonNegative('delay', args.delayMs ?? config?.delayMs, DEFAULT_MIN_INTERVAL_MS),
    timeoutMs,
    title: args.title ?? config?.mapTitle ?? DEFAULT_TITLE
  }
}
