import type { Depot, MatchedGeocodeResult } from './types'

export interface SolveRequest {
  readonly members: readonly MatchedGeocodeResult[]
  /** When present the tour starts and ends here */
  readonly depot?: Depot
  readonly signal?: AbortSignal
}

/**
 * A visiting order over the request's members. `order` holds member
 * indices; the depot is implied at both ends when the request had one.
 */
export interface TripPlan {
  readonly order: readonly number[]
  readonly distanceMiles: number
  readonly durationMinutes?: number
}

/**
 * A strategy that orders one cluster's stops. External solvers may fail or
 * time out; the optimizer falls back to the next solver in its list.
 */
export interface RouteSolver {
  readonly name: string
  /** Calls a remote service; skipped once the request deadline has passed */
  readonly external: boolean
  solve(request: SolveRequest): Promise<TripPlan>
}
