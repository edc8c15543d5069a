/**
 * Export Module
 *
 * Generate output files: the result table as CSV and the interactive map as HTML.
 */

export { escapeCSV, exportColumns, exportToCSV } from './csv'
export {
  buildLegend,
  type CircleMarker,
  DEFAULT_TITLE,
  exportToMapHTML,
  generateDataJS,
  type MapArtifact,
  type MapConfig,
  type MapLegend,
  type MapMarker,
  mapArtifactToHTML,
  type PinMarker,
  type RenderResult,
  renderMap
} from './map/index'
