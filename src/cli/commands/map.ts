/**
 * Map Command
 *
 * Runs the full pipeline on a CSV: validate → geocode → export (csv, map).
 * Ctrl-C stops after the current row; whatever was geocoded is still exported.
 */

import { basename, join } from 'node:path'
import { AddressMapperError } from '../../errors'
import { exportToCSV, exportToMapHTML } from '../../export/index'
import { createGeocodeClient, RateLimiter } from '../../geocoder/index'
import { VERSION } from '../../index'
import { readInputTable } from '../../input/index'
import {
  buildQuery,
  calculateStats,
  failedRows,
  type GeocodingRun,
  type RowFailureInfo,
  runGeocoding
} from '../../pipeline/index'
import type { InputTable } from '../../types'
import type { CLIArgs } from '../args'
import { loadConfig } from '../config'
import { ensureDir, readInputFile, writeOutputFile } from '../io'
import type { Logger } from '../logger'
import { CSV_FILENAME, MAP_FILENAME, type MapSettings, resolveMapSettings } from '../settings'
import { FAILED_ROWS_PREVIEW, formatFailedRows, formatStats, truncate } from '../summary'

export async function cmdMap(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new AddressMapperError('No input file specified', 'INPUT_NOT_FOUND')
  }

  logger.log(`\nAddress Mapper v${VERSION}`)
  logger.log(`\n📁 ${basename(args.input)}`)

  const config = await loadConfig(args.configFile)
  const settings = resolveMapSettings(args, config)
  const table = readInputTable(await readInputFile(args.input), settings.mode)

  logger.log(`   ${table.rows.length} rows (${table.mode} mode)`)

  // Dry run: show queries and exit
  if (args.dryRun) {
    showDryRun(table, settings, args.showAll, logger)
    return
  }

  if (table.rows.length === 0) {
    logger.log('\n⚠️  No data rows. Nothing to geocode.')
    await exportRun(emptyRun(table), settings, logger)
    return
  }

  const run = await geocodeTable(table, settings, logger)

  logger.log(run.cancelled ? '\n📊 Geocoding Results (cancelled)' : '\n📊 Geocoding Results')
  for (const line of formatStats(run.stats, run.cancelled)) {
    logger.log(line)
  }

  const failed = failedRows(run.results)
  if (failed.length > 0) {
    logger.log('\n❌ Failed rows')
    for (const line of formatFailedRows(failed, args.showAll)) {
      logger.log(line)
    }
  }

  await exportRun(run, settings, logger)
}

function showDryRun(
  table: InputTable,
  settings: MapSettings,
  showAll: boolean,
  logger: Logger
): void {
  logger.log('\n📋 Geocoding Preview (dry run, no API calls)')
  logger.log(`   Provider: ${settings.geocoder.provider}`)
  logger.log(`   Rows to geocode: ${table.rows.length}`)
  const seconds = Math.ceil((table.rows.length * settings.delayMs) / 1000)
  logger.log(`   Minimum run time at ${settings.delayMs}ms per row: ${seconds}s`)

  const shown = showAll ? table.rows : table.rows.slice(0, FAILED_ROWS_PREVIEW)
  logger.log('\n   Queries:')
  shown.forEach((row, i) => {
    logger.log(`   Row ${i + 1}: ${truncate(buildQuery(row), 60)}`)
  })
  const hidden = table.rows.length - shown.length
  if (hidden > 0) {
    logger.log(`   ... and ${hidden} more (use --all to list every query)`)
  }
}

function emptyRun(table: InputTable): GeocodingRun {
  return {
    results: { mode: table.mode, columns: table.columns, rows: [] },
    stats: calculateStats([]),
    cancelled: false
  }
}

async function geocodeTable(
  table: InputTable,
  settings: MapSettings,
  logger: Logger
): Promise<GeocodingRun> {
  const client = createGeocodeClient(settings.geocoder)
  const rateLimiter = new RateLimiter({ minIntervalMs: settings.delayMs })
  const controller = new AbortController()

  logger.verbose(
    `Provider: ${client.provider}, delay ${settings.delayMs}ms, timeout ${settings.timeoutMs}ms`
  )
  logger.log('\n🌍 Geocoding...')

  const onInterrupt = () => {
    logger.warn('Interrupted: stopping after the current row (Ctrl-C again to quit)')
    controller.abort()
  }
  process.once('SIGINT', onInterrupt)

  try {
    return await runGeocoding(table.rows, table.mode, {
      client,
      rateLimiter,
      timeoutMs: settings.timeoutMs,
      columns: table.columns,
      signal: controller.signal,
      onProgress: (p) => {
        logger.progress(`${p.successCount} ok, ${p.failedCount} failed`, p.completed, p.total)
      },
      onRowFailed: (info) => logRowFailure(info, logger)
    })
  } finally {
    process.removeListener('SIGINT', onInterrupt)
  }
}

function logRowFailure(info: RowFailureInfo, logger: Logger): void {
  const row = info.index + 1
  if (info.error.type === 'not_found') {
    logger.warn(`Row ${row} not found: ${info.query}`)
    return
  }
  const source = info.thrown ? 'client error' : `provider error (${info.error.type})`
  logger.warn(`Row ${row} ${source}: ${info.query}: ${info.error.message}`)
}

async function exportRun(run: GeocodingRun, settings: MapSettings, logger: Logger): Promise<void> {
  await ensureDir(settings.outputDir)
  logger.log(`\n💾 Exporting to ${settings.outputDir}`)

  if (settings.formats.includes('csv')) {
    const path = join(settings.outputDir, CSV_FILENAME)
    await writeOutputFile(path, exportToCSV(run.results))
    logger.success(`CSV: ${path}`)
  }

  if (settings.formats.includes('map')) {
    const rendered = exportToMapHTML(run.results, { title: settings.title })
    if (!rendered.ok) {
      logger.error(`Map skipped: ${rendered.error.message}`)
      return
    }
    const path = join(settings.outputDir, MAP_FILENAME)
    await writeOutputFile(path, rendered.value)
    logger.success(`Map: ${path}`)
  }
}
