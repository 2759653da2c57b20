import { centroidClusterer } from '../lib/algorithms/centroidClustering'
import type { Clusterer } from '../lib/algorithms/clustering'
import { validateMaxStopsPerRoute } from '../lib/algorithms/clustering'
import { greedyProximityClusterer } from '../lib/algorithms/greedyClustering'
import { nearestNeighborSolver } from '../lib/algorithms/nearestNeighbor'
import { createGeocodeCache } from '../lib/cache'
import { loadRoutingConfig, type RoutingConfig } from '../lib/config'
import { ROUTING_DEFAULTS } from '../lib/constants'
import { createNoGeocodedLocationsError, handleServiceError, type ErrorCode } from '../lib/errors'
import { Geocoder } from '../lib/geocoder'
import type { GeocodingProvider } from '../lib/geocodingProvider'
import { logger } from '../lib/logger'
import { NominatimGeocodingProvider } from '../lib/nominatim'
import { OpenRouteGeocodingProvider } from '../lib/openroute'
import { OsrmTripSolver } from '../lib/osrm'
import { RateGate } from '../lib/rateGate'
import { exportFailedGeocodes, exportRouteSet, type RouteSetExport } from '../lib/routeExport'
import { RouteOptimizer, type ClusterFailure } from '../lib/routeOptimizer'
import type { RouteSolver } from '../lib/routeSolver'
import type { Depot, GeocodeResult, MatchedGeocodeResult, Route, RouteSet, StopInput } from '../lib/types'
import { displayAddress, isMatched } from '../lib/types'

export interface GeocodeRequest {
  addresses: ReadonlyArray<string | StopInput>
  depotIndex?: number
  radiusMiles?: number
  /** Whole-request budget; addresses not reached in time resolve to ERROR */
  deadlineMs?: number
}

export interface GeocodedLocation {
  address: string
  originalAddress: string
  displayName: string
  lat: number
  lon: number
  distanceFromStart?: number
}

export interface FailedLocation {
  address: string
  originalAddress: string
  status: GeocodeResult['status']
  code: ErrorCode
  error: string
}

export interface GeocodeResponse {
  /** One entry per requested address, in request order */
  results: Array<GeocodedLocation | FailedLocation>
  failures: FailedLocation[]
  /** Domain results, ready to pass to optimizeRoutes */
  geocoded: GeocodeResult[]
  depot?: Depot
}

export interface OptimizeRequest {
  locations: readonly GeocodeResult[]
  depot?: Depot
  maxStopsPerRoute?: number
  useExternalSolver?: boolean
  signal?: AbortSignal
}

export interface RouteStopResponse {
  sequenceNumber: number
  isDepot: boolean
  address: string
  displayName: string
  lat: number
  lon: number
  distanceFromStart?: number
}

export interface RouteResponse {
  index: number
  totalDistanceMiles: number
  estimatedDurationMinutes?: number
  solver: string
  degraded: boolean
  stops: RouteStopResponse[]
}

export interface OptimizeResponse {
  routes: RouteResponse[]
  failures: ClusterFailure[]
  routeSet: RouteSet
}

export interface PlanRequest extends GeocodeRequest {
  maxStopsPerRoute?: number
  useExternalSolver?: boolean
}

export interface PlanResponse {
  geocoding: GeocodeResponse
  optimization: OptimizeResponse
  exported: RouteSetExport
  /** CSV of addresses that did not match, header only when all matched */
  failedGeocodesCsv: string
}

export interface RoutePlanningDependencies {
  geocoder: Geocoder
  clusterer: Clusterer
  optimizer: RouteOptimizer
  defaultMaxStopsPerRoute?: number
}

const toLocationResponse = (result: GeocodeResult): GeocodedLocation | FailedLocation => {
  const address = result.query.address
  const originalAddress = displayAddress(result.query)

  if (result.status === 'MATCHED') {
    return {
      address,
      originalAddress,
      displayName: result.displayName,
      lat: result.latitude,
      lon: result.longitude,
      ...(result.distanceFromDepotMiles !== undefined && { distanceFromStart: result.distanceFromDepotMiles })
    }
  }

  return { address, originalAddress, status: result.status, code: result.errorCode, error: result.errorDetail }
}

const isFailedLocation = (location: GeocodedLocation | FailedLocation): location is FailedLocation =>
  'error' in location

const toRouteResponse = (route: Route): RouteResponse => ({
  index: route.index,
  totalDistanceMiles: route.totalDistanceMiles,
  ...(route.estimatedDurationMinutes !== undefined && { estimatedDurationMinutes: route.estimatedDurationMinutes }),
  solver: route.solver,
  degraded: route.degraded,
  stops: route.stops.map((stop) => ({
    sequenceNumber: stop.sequenceNumber,
    isDepot: stop.isDepot,
    address: displayAddress(stop.query),
    displayName: stop.displayName,
    lat: stop.latitude,
    lon: stop.longitude,
    ...(stop.distanceFromDepotMiles !== undefined && { distanceFromStart: stop.distanceFromDepotMiles })
  }))
})

/**
 * Geocode, cluster, optimize and export delivery routes for one request.
 * Every request creates its own intermediate values; the only state shared
 * across requests is the geocoder's rate gate and response cache.
 */
export class RoutePlanningService {
  private readonly geocoder: Geocoder
  private readonly clusterer: Clusterer
  private readonly optimizer: RouteOptimizer
  private readonly defaultMaxStopsPerRoute: number

  constructor(dependencies: RoutePlanningDependencies) {
    this.geocoder = dependencies.geocoder
    this.clusterer = dependencies.clusterer
    this.optimizer = dependencies.optimizer
    this.defaultMaxStopsPerRoute = dependencies.defaultMaxStopsPerRoute ?? ROUTING_DEFAULTS.MAX_STOPS_PER_ROUTE
  }

  async geocodeAddresses(request: GeocodeRequest, signal?: AbortSignal): Promise<GeocodeResponse> {
    try {
      const requestSignal = signal ?? (request.deadlineMs !== undefined ? AbortSignal.timeout(request.deadlineMs) : undefined)
      const geocoded = await this.geocoder.geocode(request.addresses, {
        depotIndex: request.depotIndex,
        radiusMiles: request.radiusMiles,
        signal: requestSignal
      })

      const results = geocoded.map(toLocationResponse)
      const depotResult = request.depotIndex !== undefined ? geocoded[request.depotIndex] : undefined

      return {
        results,
        failures: results.filter(isFailedLocation),
        geocoded,
        ...(depotResult && isMatched(depotResult) && { depot: depotResult })
      }
    } catch (error) {
      return handleServiceError(error, 'geocodeAddresses')
    }
  }

  /**
   * Cluster the matched locations and order each cluster. Locations that did
   * not match, including those outside the radius, are left out here, before
   * clustering.
   *
   * @throws AppError CLUSTER_CONFIG_INVALID, NO_GEOCODED_LOCATIONS
   */
  async optimizeRoutes(request: OptimizeRequest): Promise<OptimizeResponse> {
    try {
      const maxStopsPerRoute = request.maxStopsPerRoute ?? this.defaultMaxStopsPerRoute
      validateMaxStopsPerRoute(maxStopsPerRoute)

      const depot = request.depot
      const stops: MatchedGeocodeResult[] = request.locations.filter(
        (location): location is MatchedGeocodeResult => isMatched(location) && location.query !== depot?.query
      )

      if (stops.length === 0) {
        const failed = request.locations.filter((location) => !isMatched(location)).length
        throw createNoGeocodedLocationsError(failed)
      }

      logger.info(
        `Optimizing ${stops.length} stops (${request.locations.length - stops.length} excluded) with ${this.clusterer.name} clustering`
      )

      const clusters = this.clusterer.cluster(stops, depot, maxStopsPerRoute)
      const { routes, failures } = await this.optimizer.optimizeAll(clusters, {
        signal: request.signal,
        useExternalSolver: request.useExternalSolver
      })

      return { routes: routes.map(toRouteResponse), failures, routeSet: routes }
    } catch (error) {
      return handleServiceError(error, 'optimizeRoutes')
    }
  }

  exportRoutes(routeSet: RouteSet): RouteSetExport {
    try {
      return exportRouteSet(routeSet)
    } catch (error) {
      return handleServiceError(error, 'exportRoutes')
    }
  }

  /**
   * The whole pipeline. With `deadlineMs`, results finished before the
   * deadline are kept; later stages fall back to local work only.
   */
  async planRoutes(request: PlanRequest): Promise<PlanResponse> {
    const signal = request.deadlineMs !== undefined ? AbortSignal.timeout(request.deadlineMs) : undefined

    const geocoding = await this.geocodeAddresses(request, signal)
    const optimization = await this.optimizeRoutes({
      locations: geocoding.geocoded,
      depot: geocoding.depot,
      maxStopsPerRoute: request.maxStopsPerRoute,
      useExternalSolver: request.useExternalSolver,
      signal
    })
    const exported = this.exportRoutes(optimization.routeSet)

    return {
      geocoding,
      optimization,
      exported,
      failedGeocodesCsv: exportFailedGeocodes(geocoding.geocoded)
    }
  }
}

const createGeocodingProvider = (config: RoutingConfig): GeocodingProvider =>
  config.geocoderProvider === 'openroute'
    ? new OpenRouteGeocodingProvider({ apiKey: config.openRouteApiKey, country: ROUTING_DEFAULTS.COUNTRY_SUFFIX })
    : new NominatimGeocodingProvider({ baseUrl: config.nominatimUrl, userAgent: config.userAgent })

/**
 * Wire the service from configuration. The rate gate and cache created here
 * live as long as the returned service.
 */
export const createRoutePlanningService = (config: RoutingConfig = loadRoutingConfig()): RoutePlanningService => {
  const geocoder = new Geocoder({
    provider: createGeocodingProvider(config),
    gate: new RateGate(config.geocoderMinIntervalMs),
    cache: createGeocodeCache(config.redisUrl),
    countrySuffix: ROUTING_DEFAULTS.COUNTRY_SUFFIX
  })

  const solvers: RouteSolver[] = []
  if (config.tripSolverUrl) {
    solvers.push(new OsrmTripSolver({ baseUrl: config.tripSolverUrl, timeoutMs: config.tripSolverTimeoutMs }))
  }
  solvers.push(nearestNeighborSolver)

  logger.info(
    `Route planning configured: ${geocoder.providerName} geocoder, ${config.clusterStrategy} clustering, solvers ${solvers
      .map((solver) => solver.name)
      .join(' > ')}`
  )

  return new RoutePlanningService({
    geocoder,
    clusterer: config.clusterStrategy === 'centroid' ? centroidClusterer : greedyProximityClusterer,
    optimizer: new RouteOptimizer({ solvers }),
    defaultMaxStopsPerRoute: config.maxStopsPerRoute
  })
}

let defaultService: RoutePlanningService | undefined

// Built on first use so configuration errors surface at the first request
export const getRoutePlanningService = (): RoutePlanningService => {
  if (!defaultService) {
    defaultService = createRoutePlanningService()
  }
  return defaultService
}

export const geocodeAddresses = (request: GeocodeRequest): Promise<GeocodeResponse> =>
  getRoutePlanningService().geocodeAddresses(request)

export const optimizeRoutes = (request: OptimizeRequest): Promise<OptimizeResponse> =>
  getRoutePlanningService().optimizeRoutes(request)

export const exportRoutes = (routeSet: RouteSet): RouteSetExport => getRoutePlanningService().exportRoutes(routeSet)

export const planRoutes = (request: PlanRequest): Promise<PlanResponse> => getRoutePlanningService().planRoutes(request)
