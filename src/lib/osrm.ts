import { API_CONFIG, DISTANCE_MODEL } from './constants'
import {
  AppError,
  createHttpStatusError,
  createOptimizeProviderError,
  createOptimizeTimeoutError,
  isTimeoutError,
  normalizeRequestError
} from './errors'
import { logger } from './logger'
import type { RouteSolver, SolveRequest, TripPlan } from './routeSolver'
import type { Coordinate } from './types'

export interface OsrmTripSolverOptions {
  baseUrl?: string
  /** OSRM routing profile, e.g. "driving" */
  profile?: string
  timeoutMs?: number
}

interface TripSummary {
  distance: number
  duration: number
  lastLeg?: { distance: number; duration: number }
}

const SOLVER_NAME = 'OSRM'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null

const parseTrip = (trip: unknown): TripSummary | null => {
  if (!isRecord(trip) || typeof trip.distance !== 'number' || typeof trip.duration !== 'number') {
    return null
  }

  let lastLeg: TripSummary['lastLeg']
  if (Array.isArray(trip.legs) && trip.legs.length > 0) {
    const leg: unknown = trip.legs[trip.legs.length - 1]
    if (isRecord(leg) && typeof leg.distance === 'number' && typeof leg.duration === 'number') {
      lastLeg = { distance: leg.distance, duration: leg.duration }
    }
  }

  return { distance: trip.distance, duration: trip.duration, lastLeg }
}

const parseWaypointIndices = (waypoints: unknown, expected: number): number[] | null => {
  if (!Array.isArray(waypoints) || waypoints.length !== expected) {
    return null
  }

  const indices: number[] = []
  for (const waypoint of waypoints) {
    if (!isRecord(waypoint) || typeof waypoint.waypoint_index !== 'number') {
      return null
    }
    indices.push(waypoint.waypoint_index)
  }
  return indices
}

const formatCoordinate = (coordinate: Coordinate): string =>
  `${coordinate.longitude.toFixed(6)},${coordinate.latitude.toFixed(6)}`

/**
 * Trip optimization through an OSRM server's `trip` service.
 *
 * The depot, when present, is sent first and pinned as the source of a
 * round trip. Without a depot OSRM still returns a round trip, so the
 * closing leg is subtracted from the reported distance and duration.
 */
export class OsrmTripSolver implements RouteSolver {
  readonly name = 'osrm'
  readonly external = true
  private readonly baseUrl: string
  private readonly profile: string
  private readonly timeoutMs: number

  constructor(options: OsrmTripSolverOptions = {}) {
    this.baseUrl = (options.baseUrl ?? API_CONFIG.TRIP_SOLVER_URL).replace(/\/+$/, '')
    this.profile = options.profile ?? 'driving'
    this.timeoutMs = options.timeoutMs ?? API_CONFIG.TRIP_SOLVER_TIMEOUT
  }

  async solve(request: SolveRequest): Promise<TripPlan> {
    const { members, depot, signal } = request
    const waypoints: Coordinate[] = depot ? [depot, ...members] : [...members]
    const offset = depot ? 1 : 0

    const params = new URLSearchParams({
      roundtrip: 'true',
      source: 'first',
      overview: 'false'
    })
    const url = `${this.baseUrl}/trip/v1/${this.profile}/${waypoints.map(formatCoordinate).join(';')}?${params}`

    const timeout = AbortSignal.timeout(this.timeoutMs)

    try {
      logger.debug(`OSRM trip request for ${waypoints.length} waypoints`)

      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json'
        },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout
      })

      if (!response.ok) {
        const errorText = await response.text()
        logger.error(`OSRM trip API error: ${response.status} - ${errorText}`)
        throw createHttpStatusError(SOLVER_NAME, response.status, errorText, (detail) =>
          createOptimizeProviderError(SOLVER_NAME, detail)
        )
      }

      const data: unknown = await response.json()
      if (!isRecord(data)) {
        throw createOptimizeProviderError(SOLVER_NAME, 'Invalid response body')
      }

      if (data.code !== 'Ok') {
        const message = typeof data.message === 'string' ? data.message : 'no message'
        throw createOptimizeProviderError(SOLVER_NAME, `${String(data.code)}: ${message}`)
      }

      if (!Array.isArray(data.trips) || data.trips.length !== 1) {
        throw createOptimizeProviderError(SOLVER_NAME, 'Expected exactly one trip in response')
      }

      const trip = parseTrip(data.trips[0])
      const positions = parseWaypointIndices(data.waypoints, waypoints.length)
      if (!trip || !positions) {
        throw createOptimizeProviderError(SOLVER_NAME, 'Malformed trip or waypoint data')
      }

      // waypoint_index is each input's position in the trip; invert it
      const order = positions
        .map((position, inputIndex) => ({ position, inputIndex }))
        .sort((a, b) => a.position - b.position)
        .filter(({ inputIndex }) => inputIndex >= offset)
        .map(({ inputIndex }) => inputIndex - offset)

      let distance = trip.distance
      let duration = trip.duration
      if (!depot && trip.lastLeg) {
        distance -= trip.lastLeg.distance
        duration -= trip.lastLeg.duration
      }

      return {
        order,
        distanceMiles: Math.max(0, distance) / DISTANCE_MODEL.METERS_PER_MILE,
        durationMinutes: Math.max(0, duration) / 60
      }
    } catch (error) {
      if (!(error instanceof AppError) && isTimeoutError(error)) {
        throw createOptimizeTimeoutError(SOLVER_NAME, this.timeoutMs)
      }
      throw normalizeRequestError(error, 'Trip optimization', (detail, originalError) =>
        createOptimizeProviderError(SOLVER_NAME, detail, originalError)
      )
    }
  }
}
