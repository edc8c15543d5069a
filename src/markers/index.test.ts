import { describe, expect, it } from 'vitest'
import type { ResultRow, ResultSet, ZipRow } from '../types'
import {
  BUCKET_COLORS,
  bucketFor,
  DEFAULT_RADIUS,
  encodeHouseholdMarkers,
  formatMagnitude,
  magnitudeRange,
  rangeOf
} from './index'

function zipResult(
  index: number,
  zipcode: string,
  householdCount: number,
  status: ResultRow['status'] = 'Success'
): ResultRow<ZipRow> {
  const geocoded = status === 'Success'
  return {
    index,
    input: { mode: 'zip', zipcode, householdCount, columns: {} },
    query: `${zipcode}, USA`,
    status,
    latitude: geocoded ? 40 + index : undefined,
    longitude: geocoded ? -70 - index : undefined
  }
}

function resultSet(rows: ResultRow<ZipRow>[]): ResultSet<ZipRow> {
  return { mode: 'zip', columns: ['zipcode', 'no_of_households'], rows }
}

describe('Marker Encoder', () => {
  describe('bucketFor', () => {
    it('closes each band on its lower bound', () => {
      expect(bucketFor(0)).toBe(1)
      expect(bucketFor(0.19)).toBe(1)
      expect(bucketFor(0.2)).toBe(2)
      expect(bucketFor(0.4)).toBe(3)
      expect(bucketFor(0.6)).toBe(4)
      expect(bucketFor(0.79)).toBe(4)
      expect(bucketFor(0.8)).toBe(5)
      expect(bucketFor(1)).toBe(5)
    })
  })

  describe('formatMagnitude', () => {
    it('prints small values as is', () => {
      expect(formatMagnitude(0)).toBe('0')
      expect(formatMagnitude(999)).toBe('999')
    })

    it('abbreviates thousands to one decimal', () => {
      expect(formatMagnitude(1000)).toBe('1.0K')
      expect(formatMagnitude(2500)).toBe('2.5K')
      expect(formatMagnitude(12000)).toBe('12.0K')
    })
  })

  describe('encodeHouseholdMarkers', () => {
    it('maps the two-ZIP example to the extreme buckets and radii', () => {
      const styles = encodeHouseholdMarkers(
        resultSet([zipResult(0, '10001', 2500), zipResult(1, '90210', 1800)])
      )

      expect(styles.get(0)).toEqual({
        radius: 50,
        bucket: 5,
        fillColor: BUCKET_COLORS[5],
        label: '2.5K'
      })
      expect(styles.get(1)).toEqual({
        radius: 5,
        bucket: 1,
        fillColor: BUCKET_COLORS[1],
        label: '1.8K'
      })
    })

    it('spans 5 to 50 and never decreases bucket with magnitude', () => {
      const counts = [10, 340, 120, 900, 55, 610, 480]
      const rows = counts.map((c, i) => zipResult(i, `1000${i}`, c))

      const styles = encodeHouseholdMarkers(resultSet(rows))
      const radii = [...styles.values()].map((s) => s.radius)

      expect(Math.min(...radii)).toBe(5)
      expect(Math.max(...radii)).toBe(50)

      const byMagnitude = [...rows]
        .sort((a, b) => a.input.householdCount - b.input.householdCount)
        .map((r) => styles.get(r.index)?.bucket ?? 0)
      for (let i = 1; i < byMagnitude.length; i++) {
        expect(byMagnitude[i]).toBeGreaterThanOrEqual(byMagnitude[i - 1] ?? 0)
      }
    })

    it('interpolates radius linearly', () => {
      const styles = encodeHouseholdMarkers(
        resultSet([zipResult(0, 'a', 0), zipResult(1, 'b', 50), zipResult(2, 'c', 100)])
      )

      expect(styles.get(1)?.radius).toBe(27.5)
      expect(styles.get(1)?.bucket).toBe(3)
    })

    it('gives every row the default radius and lowest bucket when magnitudes are equal', () => {
      const styles = encodeHouseholdMarkers(
        resultSet([zipResult(0, 'a', 300), zipResult(1, 'b', 300), zipResult(2, 'c', 300)])
      )

      for (const style of styles.values()) {
        expect(style).toEqual({
          radius: DEFAULT_RADIUS,
          bucket: 1,
          fillColor: BUCKET_COLORS[1],
          label: '300'
        })
      }
      expect(styles.size).toBe(3)
    })

    it('treats a single row as the degenerate case', () => {
      const styles = encodeHouseholdMarkers(resultSet([zipResult(0, 'a', 4200)]))

      expect(styles.get(0)).toEqual({
        radius: 25,
        bucket: 1,
        fillColor: BUCKET_COLORS[1],
        label: '4.2K'
      })
    })

    it('ignores failed rows when normalizing', () => {
      const styles = encodeHouseholdMarkers(
        resultSet([
          zipResult(0, 'a', 100),
          zipResult(1, 'b', 1_000_000, 'Failed'),
          zipResult(2, 'c', 200)
        ])
      )

      expect(styles.has(1)).toBe(false)
      expect(styles.get(2)?.radius).toBe(50)
      expect(styles.get(0)?.radius).toBe(5)
    })

    it('returns no styles when nothing was geocoded', () => {
      const styles = encodeHouseholdMarkers(resultSet([zipResult(0, 'a', 10, 'Failed')]))

      expect(styles.size).toBe(0)
    })
  })

  describe('magnitudeRange', () => {
    it('covers successful rows only', () => {
      const rows = [zipResult(0, 'a', 7), zipResult(1, 'b', 1, 'Failed'), zipResult(2, 'c', 90)]

      expect(magnitudeRange(rows, (r) => r.input.householdCount)).toEqual({ min: 7, max: 90 })
    })

    it('returns null without successful rows', () => {
      expect(magnitudeRange([], (r: ResultRow<ZipRow>) => r.input.householdCount)).toBeNull()
    })
  })

  describe('rangeOf', () => {
    it('finds min and max in one pass', () => {
      expect(rangeOf([4, -2, 9, 4])).toEqual({ min: -2, max: 9 })
      expect(rangeOf([3])).toEqual({ min: 3, max: 3 })
      expect(rangeOf([])).toBeNull()
    })
  })

  describe('large result sets', () => {
    it('encodes 300k rows', () => {
      const rows = Array.from({ length: 300_000 }, (_, i) => zipResult(i, String(i), i))
      const styles = encodeHouseholdMarkers(resultSet(rows))

      expect(styles.size).toBe(300_000)
      expect(styles.get(0)?.radius).toBe(5)
      expect(styles.get(299_999)).toMatchObject({ radius: 50, bucket: 5, label: '300.0K' })
    })
  })
})
