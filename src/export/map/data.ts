/**
 * Map Data Transformation
 *
 * Converts a result set into the MapArtifact consumed by the HTML template.
 * Only successfully geocoded rows become markers.
 */

import { encode } from 'html-entities'
import { RenderError } from '../../errors'
import { calculateCenter, filterGeocoded } from '../../geocoder/index'
import {
  BUCKET_COLORS,
  encodeHouseholdMarkers,
  formatMagnitude,
  rangeOf
} from '../../markers/index'
import type {
  AddressRow,
  ColorBucket,
  GeocodedRow,
  InputRow,
  MarkerStyle,
  ResultSet,
  ZipRow
} from '../../types'
import type {
  CircleMarker,
  LegendEntry,
  MapConfig,
  MapLegend,
  MapMarker,
  PinMarker,
  RenderResult
} from './types'

export const DEFAULT_ZOOM = 10
export const DEFAULT_TITLE = 'Address Map'
/** Coordinate decimals in address-mode popups */
export const PIN_PRECISION = 6
/** Coordinate decimals in ZIP-mode popups */
export const CIRCLE_PRECISION = 4

const BUCKETS: readonly ColorBucket[] = [1, 2, 3, 4, 5]
const BUCKET_LOWER_BOUNDS: Readonly<Record<ColorBucket, number>> = {
  1: 0,
  2: 0.2,
  3: 0.4,
  4: 0.6,
  5: 0.8
}

function formatCoordinates(row: GeocodedRow, precision: number): string {
  return `${row.latitude.toFixed(precision)}, ${row.longitude.toFixed(precision)}`
}

function popupLines(lines: ReadonlyArray<readonly [string, string]>): string {
  return lines.map(([label, value]) => `<b>${encode(label)}:</b> ${encode(value)}`).join('<br>')
}

function isAddressRow(row: GeocodedRow): row is GeocodedRow<AddressRow> {
  return row.input.mode === 'address'
}

function isZipRow(row: GeocodedRow): row is GeocodedRow<ZipRow> {
  return row.input.mode === 'zip'
}

function toPinMarker(row: GeocodedRow<AddressRow>): PinMarker {
  return {
    kind: 'pin',
    lat: row.latitude,
    lng: row.longitude,
    index: row.index,
    color: 'red',
    icon: 'home',
    tooltipHtml: encode(`Account: ${row.input.accountId}`),
    popupHtml: popupLines([
      ['Account ID', row.input.accountId],
      ['Address', row.query],
      ['Coordinates', formatCoordinates(row, PIN_PRECISION)]
    ])
  }
}

function toCircleMarker(row: GeocodedRow<ZipRow>, style: MarkerStyle): CircleMarker {
  return {
    kind: 'circle',
    lat: row.latitude,
    lng: row.longitude,
    index: row.index,
    radius: style.radius,
    bucket: style.bucket,
    fillColor: style.fillColor,
    label: style.label,
    tooltipHtml: encode(`ZIP: ${row.input.zipcode}`),
    popupHtml: popupLines([
      ['ZIP Code', row.input.zipcode],
      ['Households', row.input.householdCount.toLocaleString('en-US')],
      ['Coordinates', formatCoordinates(row, CIRCLE_PRECISION)]
    ])
  }
}

/**
 * Legend for household counts: min/max plus the value range of each bucket.
 */
export function buildLegend(rows: readonly GeocodedRow<ZipRow>[]): MapLegend | null {
  const range = rangeOf(rows.map((r) => r.input.householdCount))
  if (!range) return null

  const { min, max } = range
  const span = max - min

  const entries: LegendEntry[] = BUCKETS.map((bucket, i) => {
    const next = BUCKETS[i + 1]
    const lower = min + span * BUCKET_LOWER_BOUNDS[bucket]
    const upper = next === undefined ? max : min + span * BUCKET_LOWER_BOUNDS[next]
    return {
      bucket,
      color: BUCKET_COLORS[bucket],
      range: `${formatMagnitude(Math.round(lower))} – ${formatMagnitude(Math.round(upper))}`
    }
  })

  return { title: 'Households', min, max, entries }
}

/**
 * Build the map artifact for a result set.
 *
 * Address mode places one pin per geocoded row; ZIP mode places a circle sized
 * and colored by household count, plus a legend.
 *
 * @returns The artifact, or a RenderError when no row was geocoded
 */
export function renderMap<R extends InputRow>(
  results: ResultSet<R>,
  config: MapConfig = {}
): RenderResult {
  const geocoded: GeocodedRow[] = filterGeocoded<InputRow>(results.rows)
  const center = calculateCenter(geocoded)
  if (!center) {
    return { ok: false, error: new RenderError() }
  }

  const markers: MapMarker[] = []
  let legend: MapLegend | null = null

  if (results.mode === 'zip') {
    const zipRows = geocoded.filter(isZipRow)
    const styles = config.styles ?? encodeHouseholdMarkers({ ...results, rows: zipRows })
    for (const row of zipRows) {
      const style = styles.get(row.index)
      if (style) {
        markers.push(toCircleMarker(row, style))
      }
    }
    legend = buildLegend(zipRows)
  } else {
    for (const row of geocoded.filter(isAddressRow)) {
      markers.push(toPinMarker(row))
    }
  }

  return {
    ok: true,
    value: {
      title: config.title ?? DEFAULT_TITLE,
      center,
      zoom: config.zoom ?? DEFAULT_ZOOM,
      markers,
      legend
    }
  }
}

