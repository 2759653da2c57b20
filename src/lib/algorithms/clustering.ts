import { VALIDATION_LIMITS } from '../constants'
import { createClusterConfigError } from '../errors'
import type { Cluster, Depot, MatchedGeocodeResult } from '../types'

/**
 * Partitions geocoded stops into bounded-size groups. Implementations must
 * be deterministic for a given input order, put every stop in exactly one
 * cluster and keep each cluster between 1 and `maxStopsPerRoute` members.
 */
export interface Clusterer {
  readonly name: string
  cluster(
    stops: readonly MatchedGeocodeResult[],
    depot: Depot | undefined,
    maxStopsPerRoute: number
  ): Cluster[]
}

/**
 * @throws AppError CLUSTER_CONFIG_INVALID for anything but an integer in
 * [1, MAX_STOPS_PER_ROUTE]
 */
export const validateMaxStopsPerRoute = (maxStopsPerRoute: number): void => {
  if (
    !Number.isInteger(maxStopsPerRoute) ||
    maxStopsPerRoute < 1 ||
    maxStopsPerRoute > VALIDATION_LIMITS.MAX_STOPS_PER_ROUTE
  ) {
    throw createClusterConfigError(maxStopsPerRoute)
  }
}

export const buildCluster = (
  id: number,
  members: readonly MatchedGeocodeResult[],
  depot?: Depot
): Cluster => (depot ? { id, members, anchor: depot } : { id, members })
