/**
 * Marker Types
 */

export type ColorBucket = 1 | 2 | 3 | 4 | 5

export interface MarkerStyle {
  /** Circle radius in pixels, 5-50 */
  readonly radius: number
  readonly bucket: ColorBucket
  readonly fillColor: string
  readonly label: string
}

export interface MagnitudeRange {
  readonly min: number
  readonly max: number
}
