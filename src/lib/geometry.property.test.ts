import fc from 'fast-check'

import { geodesicMiles, roadMiles } from './geometry'

/**
 * Property-based tests for the distance model
 */

const coordinateArbitrary = fc.record({
  latitude: fc.double({ min: -90, max: 90, noNaN: true }),
  longitude: fc.double({ min: -180, max: 180, noNaN: true })
})

describe('distance model properties', () => {
  it('should give the same road distance in both directions', () => {
    fc.assert(
      fc.property(coordinateArbitrary, coordinateArbitrary, (a, b) => {
        expect(roadMiles(a, b)).toBe(roadMiles(b, a))
      }),
      { numRuns: 200 }
    )
  })

  it('should give zero for a point and itself', () => {
    fc.assert(
      fc.property(coordinateArbitrary, (point) => {
        expect(roadMiles(point, point)).toBe(0)
        expect(roadMiles(point, { ...point })).toBe(0)
      }),
      { numRuns: 100 }
    )
  })

  it('should never be negative and never shorter than the geodesic', () => {
    fc.assert(
      fc.property(coordinateArbitrary, coordinateArbitrary, (a, b) => {
        const geodesic = geodesicMiles(a, b)

        expect(Number.isFinite(geodesic)).toBe(true)
        expect(geodesic).toBeGreaterThanOrEqual(0)
        expect(roadMiles(a, b)).toBeGreaterThanOrEqual(geodesic)
      }),
      { numRuns: 200 }
    )
  })
})
