import { AppError, ErrorCode } from './errors'
import {
  assertValidCoordinate,
  calculateCentroid,
  findNearestIndex,
  geodesicMiles,
  isValidCoordinate,
  pathRoadMiles,
  roadMiles,
  roundTo
} from './geometry'
import type { Coordinate } from './types'

describe('geometry', () => {
  const minneapolis: Coordinate = { latitude: 44.9778, longitude: -93.265 }
  const stPaul: Coordinate = { latitude: 44.9537, longitude: -93.09 }

  describe('geodesicMiles', () => {
    it('should measure one degree of latitude at the equator on the WGS-84 ellipsoid', () => {
      const distance = geodesicMiles({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 })

      expect(distance).toBeCloseTo(68.70774, 4)
    })

    it('should measure one degree of longitude at the equator', () => {
      const distance = geodesicMiles({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })

      expect(distance).toBeCloseTo(69.17072, 4)
    })

    it('should measure the distance between Minneapolis and St. Paul', () => {
      expect(geodesicMiles(minneapolis, stPaul)).toBeCloseTo(8.73883, 4)
    })

    it('should return 0 for identical coordinates', () => {
      expect(geodesicMiles(minneapolis, { ...minneapolis })).toBe(0)
    })

    it('should return the same value in both directions', () => {
      expect(geodesicMiles(stPaul, minneapolis)).toBe(geodesicMiles(minneapolis, stPaul))
    })

    it('should fall back to a finite value for antipodal points', () => {
      const distance = geodesicMiles({ latitude: 0, longitude: 0 }, { latitude: 0.5, longitude: 179.7 })

      expect(Number.isFinite(distance)).toBe(true)
      expect(distance).toBeGreaterThan(12000)
    })
  })

  describe('roadMiles', () => {
    it('should scale geodesic distance by 1.35', () => {
      expect(roadMiles({ latitude: 0, longitude: 0 }, { latitude: 1, longitude: 0 })).toBeCloseTo(92.75545, 4)
      expect(roadMiles(minneapolis, stPaul)).toBeCloseTo(geodesicMiles(minneapolis, stPaul) * 1.35, 10)
    })
  })

  describe('pathRoadMiles', () => {
    it('should sum road miles between consecutive points', () => {
      expect(pathRoadMiles([minneapolis, stPaul, minneapolis])).toBeCloseTo(23.59484, 4)
    })

    it('should return 0 for fewer than two points', () => {
      expect(pathRoadMiles([])).toBe(0)
      expect(pathRoadMiles([minneapolis])).toBe(0)
    })
  })

  describe('calculateCentroid', () => {
    it('should average coordinates', () => {
      const center = calculateCentroid([
        { latitude: 44, longitude: -94 },
        { latitude: 46, longitude: -92 }
      ])

      expect(center.latitude).toBeCloseTo(45, 10)
      expect(center.longitude).toBeCloseTo(-93, 10)
    })

    it('should return a copy of a single point', () => {
      const center = calculateCentroid([minneapolis])

      expect(center).toEqual(minneapolis)
      expect(center).not.toBe(minneapolis)
    })

    it('should throw for an empty list', () => {
      expect(() => calculateCentroid([])).toThrow('No points provided for centroid calculation')
    })
  })

  describe('findNearestIndex', () => {
    it('should pick the closest candidate', () => {
      const candidates = [stPaul, { latitude: 44.98, longitude: -93.27 }, { latitude: 45.5, longitude: -93 }]

      expect(findNearestIndex(candidates, minneapolis)).toBe(1)
    })

    it('should keep the earliest candidate on ties', () => {
      const candidates = [{ ...stPaul }, { ...stPaul }]

      expect(findNearestIndex(candidates, minneapolis)).toBe(0)
    })

    it('should return -1 for no candidates', () => {
      expect(findNearestIndex([], minneapolis)).toBe(-1)
    })
  })

  describe('coordinate validation', () => {
    it('should accept coordinates within bounds', () => {
      expect(isValidCoordinate({ latitude: 90, longitude: -180 })).toBe(true)
    })

    it('should reject out-of-range and non-finite values', () => {
      expect(isValidCoordinate({ latitude: 91, longitude: 0 })).toBe(false)
      expect(isValidCoordinate({ latitude: 0, longitude: 180.5 })).toBe(false)
      expect(isValidCoordinate({ latitude: Number.NaN, longitude: 0 })).toBe(false)
    })

    it('should throw INVALID_COORDINATES from assertValidCoordinate', () => {
      let caught: unknown
      try {
        assertValidCoordinate({ latitude: 100, longitude: 0 })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(AppError)
      expect(caught).toMatchObject({ code: ErrorCode.INVALID_COORDINATES })
    })
  })

  describe('roundTo', () => {
    it('should round to the given number of decimals', () => {
      expect(roundTo(8.738831, 1)).toBe(8.7)
      expect(roundTo(12.345, 0)).toBe(12)
    })
  })
})
