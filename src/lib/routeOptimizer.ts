import { nearestNeighborSolver } from './algorithms/nearestNeighbor'
import { ConcurrencyController } from './concurrencyController'
import { ROUTING_DEFAULTS } from './constants'
import { AppError, createRouteOptimizationError, ErrorCode, toError } from './errors'
import { roundTo } from './geometry'
import { logger } from './logger'
import type { RouteSolver, TripPlan } from './routeSolver'
import type { Cluster, Route, Stop } from './types'

export interface RouteOptimizerOptions {
  /** Strategies in priority order; the first is the preferred one */
  solvers?: RouteSolver[]
  maxConcurrent?: number
}

export interface OptimizeOptions {
  /** Request deadline; once aborted only local solvers run */
  signal?: AbortSignal
  /** False restricts the run to local solvers without marking routes degraded */
  useExternalSolver?: boolean
}

export interface ClusterFailure {
  clusterId: number
  code: ErrorCode
  message: string
}

export interface OptimizationResult {
  routes: Route[]
  failures: ClusterFailure[]
}

const countDistinctWaypoints = (cluster: Cluster): number => {
  const keys = new Set(cluster.members.map((member) => `${member.latitude},${member.longitude}`))
  if (cluster.anchor) {
    keys.add(`${cluster.anchor.latitude},${cluster.anchor.longitude}`)
  }
  return keys.size
}

/**
 * Every member exactly once. The depot is added by the optimizer itself, so
 * a plan only has to be a permutation of member indices.
 */
export const isCompleteOrder = (order: readonly number[], memberCount: number): boolean => {
  if (order.length !== memberCount) {
    return false
  }
  const seen = new Set<number>()
  for (const index of order) {
    if (!Number.isInteger(index) || index < 0 || index >= memberCount || seen.has(index)) {
      return false
    }
    seen.add(index)
  }
  return true
}

/**
 * Closure check on a finished route: each member once, and the depot at
 * both ends when the cluster has one
 */
export const satisfiesClosure = (route: Route, cluster: Cluster): boolean => {
  const deliveries = route.stops.filter((stop) => !stop.isDepot)
  if (deliveries.length !== cluster.members.length) {
    return false
  }
  if (!cluster.members.every((member) => deliveries.filter((stop) => stop.query === member.query).length === 1)) {
    return false
  }

  const depots = route.stops.filter((stop) => stop.isDepot)
  if (!cluster.anchor) {
    return depots.length === 0
  }
  const first = route.stops[0]
  const last = route.stops[route.stops.length - 1]
  return depots.length === 2 && first.isDepot && last.isDepot
}

export const buildRoute = (cluster: Cluster, plan: TripPlan, solver: string, degraded: boolean): Route => {
  const sequence = [
    ...(cluster.anchor ? [cluster.anchor] : []),
    ...plan.order.map((index) => cluster.members[index]),
    ...(cluster.anchor ? [cluster.anchor] : [])
  ]
  const lastIndex = sequence.length - 1

  const stops: Stop[] = sequence.map((result, sequenceNumber) => ({
    ...result,
    sequenceNumber,
    isDepot: cluster.anchor !== undefined && (sequenceNumber === 0 || sequenceNumber === lastIndex)
  }))

  return {
    index: cluster.id,
    stops,
    totalDistanceMiles: Math.max(0, plan.distanceMiles),
    ...(plan.durationMinutes !== undefined && {
      estimatedDurationMinutes: roundTo(Math.max(0, plan.durationMinutes), 1)
    }),
    solver,
    degraded
  }
}

/**
 * RouteOptimizer orders each cluster's stops by trying its solvers in
 * priority order, falling back on failure, timeout or an incomplete order.
 */
export class RouteOptimizer {
  private readonly solvers: RouteSolver[]
  private readonly controller: ConcurrencyController

  constructor(options: RouteOptimizerOptions = {}) {
    this.solvers = options.solvers ?? [nearestNeighborSolver]
    if (this.solvers.length === 0) {
      throw new Error('RouteOptimizer needs at least one solver')
    }
    this.controller = new ConcurrencyController(options.maxConcurrent ?? ROUTING_DEFAULTS.MAX_CONCURRENT_SOLVES)
  }

  get solverNames(): string[] {
    return this.solvers.map((solver) => solver.name)
  }

  /**
   * @throws AppError ROUTE_OPTIMIZATION_FAILED when every strategy fails
   */
  async optimize(cluster: Cluster, options: OptimizeOptions = {}): Promise<Route> {
    if (cluster.members.length === 0) {
      throw createRouteOptimizationError(cluster.id, ['cluster has no members'])
    }

    const trivial = countDistinctWaypoints(cluster) < 2
    const local = this.solvers.filter((solver) => !solver.external)
    const optedOut = options.useExternalSolver === false && local.length > 0
    let candidates = optedOut ? local : this.solvers
    if (trivial && local.length > 0) {
      candidates = local
    } else if (options.signal?.aborted) {
      logger.warn(`Deadline passed, optimizing cluster ${cluster.id} with local solvers only`)
      candidates = local
    }

    const failures: string[] = []
    for (const solver of candidates) {
      try {
        const plan = await solver.solve({
          members: cluster.members,
          depot: cluster.anchor,
          signal: options.signal
        })

        if (!isCompleteOrder(plan.order, cluster.members.length)) {
          throw new Error('returned order does not visit every stop exactly once')
        }

        const preferred = optedOut ? local[0] : this.solvers[0]
        const degraded = !trivial && solver !== preferred
        const route = buildRoute(cluster, plan, solver.name, degraded)
        if (!satisfiesClosure(route, cluster)) {
          throw new Error('route does not start and end at the depot')
        }

        if (degraded) {
          logger.warn(`Cluster ${cluster.id} routed by fallback solver ${solver.name}`)
        }
        return route
      } catch (error) {
        const message = toError(error).message
        failures.push(`${solver.name}: ${message}`)
        logger.warn({ err: error, clusterId: cluster.id, solver: solver.name }, 'Route solver failed')
      }
    }

    if (failures.length === 0) {
      failures.push('no solver available')
    }
    throw createRouteOptimizationError(cluster.id, failures)
  }

  /**
   * Optimize clusters concurrently. Routes and failures come back in cluster
   * order; one cluster's failure never discards its siblings.
   */
  async optimizeAll(clusters: readonly Cluster[], options: OptimizeOptions = {}): Promise<OptimizationResult> {
    const settled = await this.controller.execute(clusters.map((cluster) => () => this.optimize(cluster, options)))

    const routes: Route[] = []
    const failures: ClusterFailure[] = []

    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        routes.push(result.value)
        return
      }

      const reason: unknown = result.reason
      const clusterId = clusters[index].id
      if (reason instanceof AppError) {
        failures.push({ clusterId, code: reason.code, message: reason.message })
      } else {
        failures.push({ clusterId, code: ErrorCode.INTERNAL_ERROR, message: toError(reason).message })
      }
      logger.error({ err: reason, clusterId }, 'Cluster could not be optimized')
    })

    logger.info(`Optimized ${routes.length} of ${clusters.length} clusters`)

    return { routes, failures }
  }
}
