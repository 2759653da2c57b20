import { calculateCentroid, findNearestIndex } from '../geometry'
import { logger } from '../logger'
import type { Cluster, Coordinate, Depot, MatchedGeocodeResult } from '../types'

import { buildCluster, validateMaxStopsPerRoute, type Clusterer } from './clustering'

/**
 * GreedyProximityClusterer grows one cluster at a time around a seed stop.
 *
 * The first seed is the stop nearest the depot (or the first stop when there
 * is no depot). The cluster then absorbs whichever unassigned stop is nearest
 * the centroid of its members until it is full. Later seeds are the
 * unassigned stop nearest the depot, or without a depot, nearest the last
 * stop added to the previous cluster. Distances are road miles and ties go
 * to the lower input index.
 */
export class GreedyProximityClusterer implements Clusterer {
  readonly name = 'greedy'

  cluster(
    stops: readonly MatchedGeocodeResult[],
    depot: Depot | undefined,
    maxStopsPerRoute: number
  ): Cluster[] {
    validateMaxStopsPerRoute(maxStopsPerRoute)

    if (stops.length === 0) {
      return []
    }

    // Splicing keeps the remaining stops in input order, so the
    // first-wins tie break in findNearestIndex is the lower input index
    const unassigned = [...stops]
    const clusters: Cluster[] = []
    let lastAdded: Coordinate | undefined

    while (unassigned.length > 0) {
      const seedTarget = depot ?? lastAdded
      const seedIndex = seedTarget ? findNearestIndex(unassigned, seedTarget) : 0
      const members = unassigned.splice(seedIndex, 1)

      while (members.length < maxStopsPerRoute && unassigned.length > 0) {
        const center = calculateCentroid(members)
        members.push(...unassigned.splice(findNearestIndex(unassigned, center), 1))
      }

      lastAdded = members[members.length - 1]
      clusters.push(buildCluster(clusters.length + 1, members, depot))
    }

    logger.info(
      `Greedy clustering: ${stops.length} stops into ${clusters.length} clusters (max ${maxStopsPerRoute} per route)`
    )

    return clusters
  }
}

export const greedyProximityClusterer = new GreedyProximityClusterer()
