import { ROUTING_DEFAULTS } from '../constants'
import { calculateCentroid, roadMiles } from '../geometry'
import { logger } from '../logger'
import type { Cluster, Coordinate, Depot, MatchedGeocodeResult } from '../types'

import { buildCluster, validateMaxStopsPerRoute, type Clusterer } from './clustering'

/**
 * CentroidClusterer partitions stops with capacitated k-means.
 *
 * k = ceil(n / max). Seeds are picked by farthest-point selection starting
 * from the depot (or the first stop), then a fixed number of Lloyd
 * iterations reassign stops to the nearest centroid that still has room.
 * Clusters are numbered by their centroid's distance from the origin.
 */
export class CentroidClusterer implements Clusterer {
  readonly name = 'centroid'
  private readonly iterations: number

  constructor(iterations: number = ROUTING_DEFAULTS.CENTROID_ITERATIONS) {
    this.iterations = iterations
  }

  cluster(
    stops: readonly MatchedGeocodeResult[],
    depot: Depot | undefined,
    maxStopsPerRoute: number
  ): Cluster[] {
    validateMaxStopsPerRoute(maxStopsPerRoute)

    if (stops.length === 0) {
      return []
    }

    const origin: Coordinate = depot ?? stops[0]
    const k = Math.ceil(stops.length / maxStopsPerRoute)

    let centroids = this.selectSeeds(stops, origin, k)
    let assignment = this.assign(stops, centroids, maxStopsPerRoute)

    for (let iteration = 1; iteration < this.iterations; iteration++) {
      centroids = this.groupMembers(stops, assignment, k).map((members) => calculateCentroid(members))
      const next = this.assign(stops, centroids, maxStopsPerRoute)
      const converged = next.every((clusterIndex, stopIndex) => clusterIndex === assignment[stopIndex])
      assignment = next
      if (converged) {
        logger.debug(`Centroid clustering converged after ${iteration} iterations`)
        break
      }
    }

    const groups = this.groupMembers(stops, assignment, k)
      .map((members) => ({ members, distance: roadMiles(origin, calculateCentroid(members)) }))
      // Array.prototype.sort is stable, so equal distances keep seed order
      .sort((a, b) => a.distance - b.distance)

    const clusters = groups.map((group, index) => buildCluster(index + 1, group.members, depot))

    logger.info(
      `Centroid clustering: ${stops.length} stops into ${clusters.length} clusters (max ${maxStopsPerRoute} per route)`
    )

    return clusters
  }

  /**
   * First seed is the stop farthest from the origin; each following seed
   * is the stop whose nearest existing seed is farthest away
   */
  private selectSeeds(stops: readonly MatchedGeocodeResult[], origin: Coordinate, k: number): Coordinate[] {
    const seeds: Coordinate[] = []
    const chosen = new Set<number>()
    const nearestSeedDistance = stops.map((stop) => roadMiles(origin, stop))

    while (seeds.length < k) {
      let bestIndex = -1
      let bestDistance = -1
      nearestSeedDistance.forEach((distance, index) => {
        if (!chosen.has(index) && distance > bestDistance) {
          bestDistance = distance
          bestIndex = index
        }
      })

      const seed = stops[bestIndex]
      chosen.add(bestIndex)
      seeds.push({ latitude: seed.latitude, longitude: seed.longitude })
      stops.forEach((stop, index) => {
        nearestSeedDistance[index] = Math.min(nearestSeedDistance[index], roadMiles(seed, stop))
      })
    }

    return seeds
  }

  /**
   * Capacity-aware assignment: stops closest to any centroid choose first,
   * each taking its nearest centroid with spare capacity.
   * Returns the cluster index of every stop.
   */
  private assign(stops: readonly MatchedGeocodeResult[], centroids: readonly Coordinate[], capacity: number): number[] {
    const preferences = stops.map((stop, stopIndex) => {
      const ranked = centroids
        .map((center, clusterIndex) => ({ clusterIndex, distance: roadMiles(center, stop) }))
        .sort((a, b) => a.distance - b.distance || a.clusterIndex - b.clusterIndex)
      return { stopIndex, ranked }
    })

    preferences.sort((a, b) => a.ranked[0].distance - b.ranked[0].distance || a.stopIndex - b.stopIndex)

    const sizes = new Array<number>(centroids.length).fill(0)
    const assignment = new Array<number>(stops.length).fill(-1)

    for (const { stopIndex, ranked } of preferences) {
      const choice = ranked.find(({ clusterIndex }) => sizes[clusterIndex] < capacity)
      if (!choice) {
        throw new Error('Centroid capacity exhausted before every stop was assigned')
      }
      sizes[choice.clusterIndex]++
      assignment[stopIndex] = choice.clusterIndex
    }

    return assignment
  }

  // Members per cluster, each in input order
  private groupMembers(
    stops: readonly MatchedGeocodeResult[],
    assignment: readonly number[],
    k: number
  ): MatchedGeocodeResult[][] {
    const groups = Array.from({ length: k }, (): MatchedGeocodeResult[] => [])
    stops.forEach((stop, index) => {
      groups[assignment[index]].push(stop)
    })
    return groups
  }
}

export const centroidClusterer = new CentroidClusterer()
