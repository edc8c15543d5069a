/**
 * Marker Encoder
 *
 * Maps a numeric magnitude (household count) across successfully geocoded
 * rows to circle radius, color bucket and label. Pure: recomputed per render.
 */

import { filterGeocoded } from '../geocoder/index'
import type {
  ColorBucket,
  InputRow,
  MagnitudeRange,
  MarkerStyle,
  ResultRow,
  ResultSet,
  ZipRow
} from '../types'

export const MIN_RADIUS = 5
export const MAX_RADIUS = 50
/** Radius used when every magnitude is the same */
export const DEFAULT_RADIUS = 25

/** Fill colors from the lowest bucket (1) to the highest (5) */
export const BUCKET_COLORS: Readonly<Record<ColorBucket, string>> = {
  1: '#ffffb2',
  2: '#fecc5c',
  3: '#fd8d3c',
  4: '#f03b20',
  5: '#bd0026'
}

/** Lower bound of t for each bucket, highest first */
const BUCKET_THRESHOLDS: ReadonlyArray<readonly [number, ColorBucket]> = [
  [0.8, 5],
  [0.6, 4],
  [0.4, 3],
  [0.2, 2]
]

export type MagnitudeAccessor<R extends InputRow> = (row: ResultRow<R>) => number

export function householdCount(row: ResultRow<ZipRow>): number {
  return row.input.householdCount
}

/**
 * Bucket for a normalized magnitude in [0, 1].
 */
export function bucketFor(t: number): ColorBucket {
  for (const [threshold, bucket] of BUCKET_THRESHOLDS) {
    if (t >= threshold) return bucket
  }
  return 1
}

/**
 * Short label: "950", "2.5K".
 */
export function formatMagnitude(value: number): string {
  if (value < 1000) return String(value)
  return `${(value / 1000).toFixed(1)}K`
}

/**
 * Min and max of a list of values, or null when it is empty.
 * Single pass, so the input may be any length.
 */
export function rangeOf(values: Iterable<number>): MagnitudeRange | null {
  let range: MagnitudeRange | null = null
  for (const value of values) {
    if (range === null) {
      range = { min: value, max: value }
    } else if (value < range.min) {
      range = { min: value, max: range.max }
    } else if (value > range.max) {
      range = { min: range.min, max: value }
    }
  }
  return range
}

/**
 * Min and max magnitude over successful rows, or null when there are none.
 */
export function magnitudeRange<R extends InputRow>(
  rows: readonly ResultRow<R>[],
  magnitude: MagnitudeAccessor<R>
): MagnitudeRange | null {
  return rangeOf(filterGeocoded(rows).map(magnitude))
}

/**
 * Compute a marker style for every successfully geocoded row.
 *
 * When all magnitudes are equal every row gets the default radius and the
 * lowest bucket.
 *
 * @returns Styles keyed by row index; failed and pending rows have no entry
 */
export function encodeMarkers<R extends InputRow>(
  results: ResultSet<R>,
  magnitude: MagnitudeAccessor<R>
): Map<number, MarkerStyle> {
  const styles = new Map<number, MarkerStyle>()
  const range = magnitudeRange(results.rows, magnitude)
  if (!range) return styles

  const span = range.max - range.min

  for (const row of filterGeocoded(results.rows)) {
    const value = magnitude(row)
    const label = formatMagnitude(value)

    if (span === 0) {
      styles.set(row.index, {
        radius: DEFAULT_RADIUS,
        bucket: 1,
        fillColor: BUCKET_COLORS[1],
        label
      })
      continue
    }

    const t = (value - range.min) / span
    const bucket = bucketFor(t)
    styles.set(row.index, {
      radius: MIN_RADIUS + (MAX_RADIUS - MIN_RADIUS) * t,
      bucket,
      fillColor: BUCKET_COLORS[bucket],
      label
    })
  }

  return styles
}

/**
 * Styles for a ZIP-mode result set, sized by household count.
 */
export function encodeHouseholdMarkers(results: ResultSet<ZipRow>): Map<number, MarkerStyle> {
  return encodeMarkers(results, householdCount)
}
