/**
 * Map Export Module
 *
 * Renders geocoded results to a MapArtifact and serializes it as a
 * single self-contained HTML file.
 */

import type { InputRow, ResultSet } from '../../types'
import { renderMap } from './data'
import { generateMapHTML } from './template'
import type { MapArtifact, MapConfig, RenderResult } from './types'

export {
  buildLegend,
  CIRCLE_PRECISION,
  DEFAULT_TITLE,
  DEFAULT_ZOOM,
  PIN_PRECISION,
  renderMap
} from './data'
export { generateLegendHTML, generateMapHTML } from './template'
export type {
  CircleMarker,
  LegendEntry,
  MapArtifact,
  MapConfig,
  MapLegend,
  MapMarker,
  PinMarker,
  RenderResult
} from './types'

/**
 * Generate the map data JavaScript. `<` is escaped so popup text cannot close the script tag.
 */
export function generateDataJS(artifact: MapArtifact): string {
  return `var mapData = ${JSON.stringify(artifact, null, 2).replace(/</g, '\\u003c')};`
}

/**
 * Serialize a rendered map to HTML.
 */
export function mapArtifactToHTML(artifact: MapArtifact): string {
  return generateMapHTML({
    title: artifact.title,
    data: generateDataJS(artifact),
    legend: artifact.legend
  })
}

/**
 * Render results straight to HTML.
 *
 * @returns HTML, or the RenderError when no row was geocoded
 */
export function exportToMapHTML<R extends InputRow>(
  results: ResultSet<R>,
  config: MapConfig = {}
): { ok: true; value: string } | Extract<RenderResult, { ok: false }> {
  const rendered = renderMap(results, config)
  if (!rendered.ok) return rendered
  return { ok: true, value: mapArtifactToHTML(rendered.value) }
}
