import fc from 'fast-check'

import type { MatchedGeocodeResult } from '../types'

import { centroidClusterer } from './centroidClustering'
import type { Clusterer } from './clustering'
import { greedyProximityClusterer } from './greedyClustering'

/**
 * Partition properties shared by every clustering strategy
 */

// Stops inside a roughly 70 x 50 mile box, at 0.001 degree resolution
const stopArbitrary = fc
  .tuple(fc.integer({ min: 0, max: 1000 }), fc.integer({ min: 0, max: 1000 }))
  .map(([latStep, lonStep]): MatchedGeocodeResult => {
    const latitude = 44 + latStep / 1000
    const longitude = -94 + lonStep / 1000
    const label = `${latitude},${longitude}`
    return {
      query: { address: label },
      status: 'MATCHED',
      latitude,
      longitude,
      displayName: label,
      matchedQuery: label
    }
  })

const strategies: Clusterer[] = [greedyProximityClusterer, centroidClusterer]

describe.each(strategies.map((strategy) => [strategy.name, strategy] as const))(
  '%s clustering properties',
  (_name, clusterer) => {
    it('should place every stop in exactly one cluster of bounded size', () => {
      fc.assert(
        fc.property(
          fc.array(stopArbitrary, { minLength: 1, maxLength: 30 }),
          fc.integer({ min: 1, max: 8 }),
          fc.option(stopArbitrary, { nil: undefined }),
          (stops, maxStopsPerRoute, depot) => {
            const clusters = clusterer.cluster(stops, depot, maxStopsPerRoute)

            expect(clusters).toHaveLength(Math.ceil(stops.length / maxStopsPerRoute))
            expect(clusters.map((cluster) => cluster.id)).toEqual(clusters.map((_, index) => index + 1))

            const seen = new Set<MatchedGeocodeResult>()
            for (const cluster of clusters) {
              expect(cluster.members.length).toBeGreaterThanOrEqual(1)
              expect(cluster.members.length).toBeLessThanOrEqual(maxStopsPerRoute)
              expect(cluster.anchor).toBe(depot)
              for (const member of cluster.members) {
                expect(seen.has(member)).toBe(false)
                seen.add(member)
              }
            }
            expect(seen.size).toBe(stops.length)
            stops.forEach((stop) => expect(seen.has(stop)).toBe(true))
          }
        ),
        { numRuns: 100 }
      )
    })

    it('should be deterministic for the same input', () => {
      fc.assert(
        fc.property(
          fc.array(stopArbitrary, { minLength: 1, maxLength: 20 }),
          fc.integer({ min: 1, max: 6 }),
          (stops, maxStopsPerRoute) => {
            const first = clusterer.cluster(stops, undefined, maxStopsPerRoute)
            const second = clusterer.cluster(stops, undefined, maxStopsPerRoute)

            expect(second.map((cluster) => cluster.members)).toEqual(first.map((cluster) => cluster.members))
          }
        ),
        { numRuns: 50 }
      )
    })
  }
)
