import { findNearestIndex, pathRoadMiles } from '../geometry'
import type { RouteSolver, SolveRequest, TripPlan } from '../routeSolver'
import type { Coordinate, Depot, MatchedGeocodeResult } from '../types'

/**
 * Local nearest-neighbour tour. Starts at the depot, or at the first member
 * when there is none, and always moves to the closest unvisited stop by
 * road miles. With a depot the tour returns to it and the closing leg
 * counts toward the distance.
 */
export class NearestNeighborSolver implements RouteSolver {
  readonly name = 'nearest-neighbor'
  readonly external = false

  planTour(members: readonly MatchedGeocodeResult[], depot?: Depot): TripPlan {
    if (members.length === 0) {
      return { order: [], distanceMiles: 0 }
    }

    const pending = members.map((member, index) => ({ index, latitude: member.latitude, longitude: member.longitude }))
    const order: number[] = []
    let current: Coordinate

    if (depot) {
      current = depot
    } else {
      const [seed] = pending.splice(0, 1)
      order.push(seed.index)
      current = seed
    }

    while (pending.length > 0) {
      const [next] = pending.splice(findNearestIndex(pending, current), 1)
      order.push(next.index)
      current = next
    }

    const path: Coordinate[] = order.map((index) => members[index])
    if (depot) {
      path.unshift(depot)
      path.push(depot)
    }

    return { order, distanceMiles: pathRoadMiles(path) }
  }

  async solve(request: SolveRequest): Promise<TripPlan> {
    return this.planTour(request.members, request.depot)
  }
}

export const nearestNeighborSolver = new NearestNeighborSolver()
