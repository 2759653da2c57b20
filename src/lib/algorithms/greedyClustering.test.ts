import { AppError, ErrorCode } from '../errors'
import type { Cluster, MatchedGeocodeResult } from '../types'

import { GreedyProximityClusterer, greedyProximityClusterer } from './greedyClustering'

const stop = (label: string, latitude: number, longitude: number): MatchedGeocodeResult => ({
  query: { address: label, originalAddress: label },
  status: 'MATCHED',
  latitude,
  longitude,
  displayName: label,
  matchedQuery: label
})

const labels = (clusters: Cluster[]): string[][] =>
  clusters.map((cluster) => cluster.members.map((member) => member.displayName))

describe('GreedyProximityClusterer', () => {
  let clusterer: GreedyProximityClusterer

  beforeEach(() => {
    clusterer = new GreedyProximityClusterer()
  })

  it('should fill clusters outward from the depot', () => {
    const depot = stop('Depot', 44.0, -93.0)
    // k1..k9 line up north of the depot, one hundredth of a degree apart
    const line = Array.from({ length: 9 }, (_, i) => stop(`k${i + 1}`, 44 + (i + 1) / 100, -93.0))
    const shuffled = [4, 1, 8, 0, 6, 2, 7, 3, 5].map((index) => line[index])

    const clusters = clusterer.cluster(shuffled, depot, 4)

    expect(clusters.map((cluster) => cluster.members.length)).toEqual([4, 4, 1])
    expect(labels(clusters)).toEqual([
      ['k1', 'k2', 'k3', 'k4'],
      ['k5', 'k6', 'k7', 'k8'],
      ['k9']
    ])
    expect(clusters.map((cluster) => cluster.id)).toEqual([1, 2, 3])
    clusters.forEach((cluster) => expect(cluster.anchor).toBe(depot))
  })

  it('should seed from the last stop added when there is no depot', () => {
    const stops = [
      stop('A', 44.3, -93.0),
      stop('B', 44.0, -93.0),
      stop('C', 44.31, -93.0),
      stop('D', 44.1, -93.0)
    ]

    const clusters = clusterer.cluster(stops, undefined, 2)

    expect(labels(clusters)).toEqual([
      ['A', 'C'],
      ['D', 'B']
    ])
    clusters.forEach((cluster) => expect(cluster).not.toHaveProperty('anchor'))
  })

  it('should break distance ties by input order', () => {
    const stops = [stop('X1', 44.0, -93.0), stop('X2', 44.0, -93.0), stop('X3', 44.0, -93.0)]

    const clusters = clusterer.cluster(stops, stop('Depot', 44.5, -93.0), 2)

    expect(labels(clusters)).toEqual([['X1', 'X2'], ['X3']])
  })

  it('should produce identical clusters for identical input', () => {
    const stops = [stop('A', 44.3, -93.2), stop('B', 44.0, -93.1), stop('C', 44.31, -93.0), stop('D', 44.1, -93.3)]

    expect(labels(greedyProximityClusterer.cluster(stops, undefined, 3))).toEqual(
      labels(greedyProximityClusterer.cluster(stops, undefined, 3))
    )
  })

  it('should return no clusters for no stops', () => {
    expect(clusterer.cluster([], undefined, 5)).toEqual([])
  })

  it('should reject an invalid maximum', () => {
    for (const max of [0, -1, 1.5, 501, Number.NaN]) {
      let thrown: unknown
      try {
        clusterer.cluster([stop('A', 44, -93)], undefined, max)
      } catch (error) {
        thrown = error
      }
      expect(thrown).toBeInstanceOf(AppError)
      expect(thrown).toMatchObject({ code: ErrorCode.CLUSTER_CONFIG_INVALID })
    }
  })
})
