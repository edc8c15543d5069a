/**
 * Geocoding Pipeline
 *
 * Resolves every input row, one request at a time, through the rate limiter.
 * A row that cannot be geocoded is marked Failed and the run moves on: the
 * output always has one row per input row, in input order.
 */

import { DEFAULT_TIMEOUT_MS, RateLimiter } from '../geocoder/index'
import type {
  ApiError,
  GeocodeClient,
  GeocodeLookup,
  GeocodingStats,
  InputMode,
  InputRow,
  ResultRow,
  ResultSet
} from '../types'

/**
 * Progress info emitted after each row.
 */
export interface PipelineProgress {
  /** Rows processed so far */
  readonly completed: number
  readonly total: number
  /** Query of the row just processed */
  readonly query: string
  readonly successCount: number
  readonly failedCount: number
}

/**
 * Details of a row that could not be geocoded.
 */
export interface RowFailureInfo {
  readonly index: number
  readonly query: string
  readonly error: ApiError
  /** True when the client threw instead of returning a result */
  readonly thrown: boolean
}

export interface PipelineOptions {
  readonly client: GeocodeClient
  /** Shared limiter; a fresh 100ms limiter is used when omitted */
  readonly rateLimiter?: RateLimiter | undefined
  /** Per-request timeout (default 10s) */
  readonly timeoutMs?: number | undefined
  /** Header order of the source table, kept for export */
  readonly columns?: readonly string[] | undefined
  readonly onProgress?: ((progress: PipelineProgress) => void) | undefined
  readonly onRowFailed?: ((info: RowFailureInfo) => void) | undefined
  /** Checked between rows, never mid-request */
  readonly signal?: AbortSignal | undefined
}

export interface GeocodingRun<R extends InputRow = InputRow> {
  readonly results: ResultSet<R>
  readonly stats: GeocodingStats
  /** True when the signal stopped the run; unprocessed rows stay Pending */
  readonly cancelled: boolean
}

/**
 * Build the query string for a row.
 */
export function buildQuery(row: InputRow): string {
  switch (row.mode) {
    case 'address':
      return `${row.street}, ${row.city}, ${row.state} ${row.zipcode}`
    case 'zip':
      return `${row.zipcode}, USA`
  }
}

/**
 * Count rows by status.
 */
export function calculateStats(rows: readonly ResultRow[]): GeocodingStats {
  let successCount = 0
  let failedCount = 0
  let pendingCount = 0

  for (const row of rows) {
    switch (row.status) {
      case 'Success':
        successCount++
        break
      case 'Failed':
        failedCount++
        break
      case 'Pending':
        pendingCount++
        break
    }
  }

  return { total: rows.length, successCount, failedCount, pendingCount }
}

/**
 * Share of rows geocoded, 0 when there are no rows.
 */
export function successRate(stats: GeocodingStats): number {
  return stats.total === 0 ? 0 : stats.successCount / stats.total
}

function pendingRow<R extends InputRow>(input: R, index: number): ResultRow<R> {
  return { index, input, query: buildQuery(input), status: 'Pending' }
}

async function lookupRow(
  client: GeocodeClient,
  limiter: RateLimiter,
  query: string,
  timeoutMs: number
): Promise<{ lookup: GeocodeLookup; thrown: boolean }> {
  try {
    const lookup = await limiter.run(() => client.resolve(query, timeoutMs))
    return { lookup, thrown: false }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    return { lookup: { ok: false, error: { type: 'network', message } }, thrown: true }
  }
}

/**
 * Geocode rows in input order.
 *
 * @param rows Input rows (all of one mode)
 * @param mode Mode of the rows, recorded on the result set
 * @param options Client, limiter and callbacks
 * @returns Result set with one row per input row, plus status counts
 */
export async function runGeocoding<R extends InputRow>(
  rows: readonly R[],
  mode: InputMode,
  options: PipelineOptions
): Promise<GeocodingRun<R>> {
  const limiter = options.rateLimiter ?? new RateLimiter()
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  const results: ResultRow<R>[] = rows.map((row, index) => pendingRow(row, index))
  const columns = options.columns ?? (rows[0] ? Object.keys(rows[0].columns) : [])

  let successCount = 0
  let failedCount = 0
  let cancelled = false

  for (let index = 0; index < results.length; index++) {
    if (options.signal?.aborted) {
      cancelled = true
      break
    }

    const pending = results[index]
    if (!pending) continue

    const { lookup, thrown } = await lookupRow(options.client, limiter, pending.query, timeoutMs)

    if (lookup.ok) {
      results[index] = {
        ...pending,
        status: 'Success',
        latitude: lookup.value.latitude,
        longitude: lookup.value.longitude
      }
      successCount++
    } else {
      results[index] = {
        ...pending,
        status: 'Failed',
        failure: { type: lookup.error.type, message: lookup.error.message }
      }
      failedCount++
      options.onRowFailed?.({ index, query: pending.query, error: lookup.error, thrown })
    }

    options.onProgress?.({
      completed: index + 1,
      total: results.length,
      query: pending.query,
      successCount,
      failedCount
    })
  }

  return {
    results: { mode, columns, rows: results },
    stats: calculateStats(results),
    cancelled
  }
}

/**
 * Rows that failed, in input order, optionally limited to the first N.
 */
export function failedRows<R extends InputRow>(
  results: ResultSet<R>,
  limit?: number
): ResultRow<R>[] {
  const failed = results.rows.filter((r) => r.status === 'Failed')
  return limit === undefined ? failed : failed.slice(0, limit)
}
