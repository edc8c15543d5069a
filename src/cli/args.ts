/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 * Options that can also come from the config file stay undefined when not
 * given, so the config value (or the built-in default) applies.
 */

import { Command } from 'commander'
import { AddressMapperError } from '../errors'
import { VERSION } from '../index'
import type { InputMode } from '../types'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type ModeOption = InputMode | 'auto'

export type ConfigAction = 'list' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  input: string
  mode: ModeOption
  outputDir: string | undefined
  formats: string[] | undefined
  provider: string | undefined
  country: string | undefined
  delayMs: number | undefined
  timeoutMs: number | undefined
  userAgent: string | undefined
  title: string | undefined
  quiet: boolean
  verbose: boolean
  dryRun: boolean
  showAll: boolean
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Geocode a CSV of street addresses or ZIP codes and plot them on an interactive map.

Input modes (auto-detected from the header row):
  • address: account_id, street, city, state, zipcode
  • zip:     zipcode, no_of_households

Examples:
  $ address-mapper validate customers.csv
  $ address-mapper map customers.csv
  $ address-mapper map households.csv --mode zip --title "Households by ZIP"
  $ address-mapper map customers.csv --provider google --country US`

function createProgram(): Command {
  const program = new Command()
    .name('address-mapper')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set ADDRESS_MAPPER_CONFIG)')

  // ============ MAP (full pipeline) ============
  program
    .command('map')
    .description('Validate, geocode and export a CSV (validate → geocode → csv + map)')
    .argument('<input>', 'CSV file of addresses or ZIP codes')
    .option('-m, --mode <mode>', 'Input mode: address, zip, auto', 'auto')
    .option('-o, --output-dir <dir>', 'Output directory (default: ./output)')
    .option('-f, --format <formats>', 'Output formats: csv,map (default: csv,map)')
    .option('-p, --provider <name>', 'Geocoding provider: nominatim, google (default: nominatim)')
    .option('-c, --country <name>', 'Bias lookups towards a country (name or ISO code)')
    .option('--delay <ms>', 'Minimum delay between lookups in ms (default: 100)')
    .option('--timeout <ms>', 'Per-lookup timeout in ms (default: 10000)')
    .option('--user-agent <ua>', 'User-Agent for Nominatim requests')
    .option('-t, --title <title>', 'Map page title')
    .option('--dry-run', 'Validate and show queries without API calls')
    .option('-a, --all', 'List every failed row in the summary')

  // ============ VALIDATE ============
  program
    .command('validate')
    .description('Check required columns and cell values without geocoding')
    .argument('<input>', 'CSV file of addresses or ZIP codes')
    .option('-m, --mode <mode>', 'Input mode: address, zip, auto', 'auto')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  address-mapper config                          List current settings
  address-mapper config set provider google      Use the Google Geocoding API
  address-mapper config set delayMs 1000         Wait a second between lookups
  address-mapper config unset country            Remove the country bias`
    )

  return program
}

function invalidOption(message: string): AddressMapperError {
  return new AddressMapperError(message, 'CONFIG_ERROR')
}

function parseMode(value: unknown): ModeOption {
  if (value === undefined) return 'auto'
  if (value === 'address' || value === 'zip' || value === 'auto') {
    return value
  }
  throw invalidOption(`Invalid --mode: ${String(value)} (expected address, zip or auto)`)
}

function parseInteger(flag: string, value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw invalidOption(`Invalid ${flag}: "${value}" (expected a non-negative integer in ms)`)
  }
  return Number.parseInt(trimmed, 10)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    input,
    mode: parseMode(opts.mode),
    outputDir: optionalString(opts.outputDir),
    formats:
      typeof opts.format === 'string' ? opts.format.split(',').map((f) => f.trim()) : undefined,
    provider: optionalString(opts.provider),
    country: optionalString(opts.country),
    delayMs: parseInteger('--delay', opts.delay),
    timeoutMs: parseInteger('--timeout', opts.timeout),
    userAgent: optionalString(opts.userAgent),
    title: optionalString(opts.title),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    dryRun: opts.dryRun === true,
    showAll: opts.all === true,
    configFile: optionalString(opts.configFile),
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

function attachActions(program: Command, onParsed: (args: CLIArgs) => void): void {
  // optsWithGlobals() includes global options from the parent program
  for (const cmd of program.commands) {
    if (cmd.name() === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        onParsed({
          ...buildCLIArgs('config', '', cmd.optsWithGlobals()),
          configAction: parseConfigAction(action),
          configKey: key,
          configValue: value
        })
      })
    } else {
      cmd.action((input: string) => {
        onParsed(buildCLIArgs(cmd.name(), input, cmd.optsWithGlobals()))
      })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => {}, writeErr: () => {} })
  }

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof AddressMapperError) {
      throw error
    }
    // exitOverride throws on help/version
    if (!result) {
      return buildCLIArgs('help', '', {})
    }
    throw error
  }

  return result ?? buildCLIArgs('help', '', {})
}
