/**
 * Map Export Types
 */

import type { RenderError } from '../../errors'
import type { ColorBucket, MarkerStyle } from '../../types'

interface BaseMarker {
  lat: number
  lng: number
  /** Row index in the result set */
  index: number
  /** Escaped HTML shown on hover */
  tooltipHtml: string
  /** Escaped HTML shown on click */
  popupHtml: string
}

/** Address mode: a plain pin per row */
export interface PinMarker extends BaseMarker {
  kind: 'pin'
  color: string
  icon: string
}

/** ZIP mode: a sized, colored circle with a text label */
export interface CircleMarker extends BaseMarker {
  kind: 'circle'
  radius: number
  bucket: ColorBucket
  fillColor: string
  label: string
}

export type MapMarker = PinMarker | CircleMarker

export interface LegendEntry {
  bucket: ColorBucket
  color: string
  /** e.g. "1.8K – 1.9K" */
  range: string
}

export interface MapLegend {
  title: string
  min: number
  max: number
  entries: LegendEntry[]
}

export interface MapArtifact {
  title: string
  center: { lat: number; lng: number }
  zoom: number
  markers: MapMarker[]
  /** Present in ZIP (magnitude) mode only */
  legend: MapLegend | null
}

export interface MapConfig {
  readonly title?: string | undefined
  readonly zoom?: number | undefined
  /** Pre-computed styles keyed by row index (ZIP mode); computed when omitted */
  readonly styles?: ReadonlyMap<number, MarkerStyle> | undefined
}

export type RenderResult =
  | { readonly ok: true; readonly value: MapArtifact }
  | { readonly ok: false; readonly error: RenderError }
