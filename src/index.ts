/**
 * Address Mapper Core Library
 *
 * Geocode CSV rows of addresses or ZIP codes and plot them on a map.
 *
 * Design principle: no file IO, no progress rendering, no process handling.
 * Side effects are limited to the provider HTTP calls; everything else is a
 * function of its inputs.
 *
 * @license AGPL-3.0
 */

// Errors
export {
  AddressMapperError,
  getErrorMessage,
  ProviderError,
  RenderError,
  unwrapLookup,
  ValidationError
} from './errors'
// Export module
export {
  buildLegend,
  escapeCSV,
  exportColumns,
  exportToCSV,
  exportToMapHTML,
  generateDataJS,
  mapArtifactToHTML,
  renderMap
} from './export/index'
export type {
  CircleMarker,
  MapArtifact,
  MapConfig,
  MapLegend,
  MapMarker,
  PinMarker,
  RenderResult
} from './export/index'
// Geocoder module
export {
  calculateCenter,
  countGeocoded,
  createGeocodeClient,
  createGoogleClient,
  createNominatimClient,
  DEFAULT_MIN_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  filterGeocoded,
  isGeocoded,
  RateLimiter,
  type RateLimiterOptions,
  toRegionCode
} from './geocoder/index'
// Input module
export {
  ADDRESS_COLUMNS,
  detectMode,
  findMissingColumns,
  parseCSV,
  REQUIRED_COLUMNS,
  readInputTable,
  validateColumns,
  ZIP_COLUMNS
} from './input/index'
// Marker encoding
export {
  BUCKET_COLORS,
  bucketFor,
  encodeHouseholdMarkers,
  encodeMarkers,
  formatMagnitude,
  householdCount,
  type MagnitudeAccessor,
  magnitudeRange
} from './markers/index'
// Geocoding pipeline
export {
  buildQuery,
  calculateStats,
  failedRows,
  type GeocodingRun,
  type PipelineOptions,
  type PipelineProgress,
  type RowFailureInfo,
  runGeocoding,
  successRate
} from './pipeline/index'
// Types
export type {
  AddressRow,
  ApiError,
  ApiErrorType,
  ColorBucket,
  Coordinate,
  GeocodeClient,
  GeocodedRow,
  GeocodeLookup,
  GeocodeProvider,
  GeocoderConfig,
  GeocodeStatus,
  GeocodingStats,
  InputMode,
  InputRow,
  InputTable,
  MagnitudeRange,
  MarkerStyle,
  Result,
  ResultRow,
  ResultSet,
  RowFailure,
  ZipRow
} from './types'

/**
 * Library version.
 */
export const VERSION = '0.1.0'
