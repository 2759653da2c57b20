/**
 * Runtime configuration for the route planner, read from environment variables
 *
 * - GEOCODER_PROVIDER: 'nominatim' (default) or 'openroute'
 * - NOMINATIM_URL, GEOCODER_USER_AGENT: Nominatim endpoint and identification
 * - GEOCODER_MIN_INTERVAL_MS: spacing between geocoding requests, at least 1000
 * - OPENROUTE_SERVICE_API_KEY: required for the openroute provider
 * - TRIP_SOLVER_URL: OSRM server; set to an empty string to disable it
 * - TRIP_SOLVER_TIMEOUT_MS: per-cluster timeout for the trip solver
 * - CLUSTER_STRATEGY: 'greedy' (default) or 'centroid'
 * - MAX_STOPS_PER_ROUTE: default route size when a request gives none
 * - REDIS_URL: enables the shared geocoding cache
 */

import { API_CONFIG, ROUTING_DEFAULTS, VALIDATION_LIMITS } from './constants'

export type GeocoderProviderName = 'nominatim' | 'openroute'

export type ClusterStrategy = 'greedy' | 'centroid'

export interface RoutingConfig {
  geocoderProvider: GeocoderProviderName
  nominatimUrl: string
  userAgent: string
  geocoderMinIntervalMs: number
  openRouteApiKey?: string
  /** Undefined when the external trip solver is disabled */
  tripSolverUrl?: string
  tripSolverTimeoutMs: number
  clusterStrategy: ClusterStrategy
  maxStopsPerRoute: number
  redisUrl?: string
}

export type Environment = Record<string, string | undefined>

/**
 * Validation error for routing configuration
 */
export class RoutingConfigError extends Error {
  constructor(message: string, public field?: string) {
    super(message)
    this.name = 'RoutingConfigError'
  }
}

const GEOCODER_PROVIDERS: readonly GeocoderProviderName[] = ['nominatim', 'openroute']
const CLUSTER_STRATEGIES: readonly ClusterStrategy[] = ['greedy', 'centroid']

const isProviderName = (value: string): value is GeocoderProviderName =>
  GEOCODER_PROVIDERS.some((provider) => provider === value)

const isClusterStrategy = (value: string): value is ClusterStrategy =>
  CLUSTER_STRATEGIES.some((strategy) => strategy === value)

/**
 * @throws RoutingConfigError if the provider is unknown
 */
export const validateGeocoderProvider = (value: string): GeocoderProviderName => {
  const normalized = value.trim().toLowerCase()
  if (!isProviderName(normalized)) {
    throw new RoutingConfigError(
      `Invalid geocoder provider: ${value}. Must be one of: ${GEOCODER_PROVIDERS.join(', ')}`,
      'GEOCODER_PROVIDER'
    )
  }
  return normalized
}

/**
 * @throws RoutingConfigError if the strategy is unknown
 */
export const validateClusterStrategy = (value: string): ClusterStrategy => {
  const normalized = value.trim().toLowerCase()
  if (!isClusterStrategy(normalized)) {
    throw new RoutingConfigError(
      `Invalid cluster strategy: ${value}. Must be one of: ${CLUSTER_STRATEGIES.join(', ')}`,
      'CLUSTER_STRATEGY'
    )
  }
  return normalized
}

/**
 * Parse an integer setting within [min, max]
 * @throws RoutingConfigError if the value is not an integer in range
 */
export const parseIntegerSetting = (field: string, raw: string, min: number, max: number): number => {
  const value = Number(raw.trim())
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new RoutingConfigError(`Invalid ${field}: ${raw}. Must be an integer`, field)
  }

  if (value < min || value > max) {
    throw new RoutingConfigError(`Invalid ${field}: ${value}. Must be between ${min} and ${max}`, field)
  }

  return value
}

/**
 * @throws RoutingConfigError for anything but an http(s) URL
 */
export const validateUrl = (field: string, raw: string): string => {
  let url: URL
  try {
    url = new URL(raw)
  } catch (error) {
    throw new RoutingConfigError(`Invalid ${field}: ${raw}. Must be an absolute URL`, field)
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new RoutingConfigError(`Invalid ${field}: ${raw}. Must use http or https`, field)
  }

  return raw.replace(/\/+$/, '')
}

const present = (value: string | undefined): value is string => value !== undefined && value.trim() !== ''

/**
 * Build the routing configuration from an environment map
 * @throws RoutingConfigError if any setting is invalid
 */
export const loadRoutingConfig = (env: Environment = process.env): RoutingConfig => {
  const geocoderProvider = present(env.GEOCODER_PROVIDER)
    ? validateGeocoderProvider(env.GEOCODER_PROVIDER)
    : 'nominatim'

  const openRouteApiKey = present(env.OPENROUTE_SERVICE_API_KEY) ? env.OPENROUTE_SERVICE_API_KEY.trim() : undefined
  if (geocoderProvider === 'openroute' && !openRouteApiKey) {
    throw new RoutingConfigError(
      'OPENROUTE_SERVICE_API_KEY is required when GEOCODER_PROVIDER is openroute',
      'OPENROUTE_SERVICE_API_KEY'
    )
  }

  // An explicitly empty TRIP_SOLVER_URL disables the external solver
  let tripSolverUrl: string | undefined = API_CONFIG.TRIP_SOLVER_URL
  if (env.TRIP_SOLVER_URL !== undefined) {
    tripSolverUrl = present(env.TRIP_SOLVER_URL) ? validateUrl('TRIP_SOLVER_URL', env.TRIP_SOLVER_URL.trim()) : undefined
  }

  const config: RoutingConfig = {
    geocoderProvider,
    nominatimUrl: present(env.NOMINATIM_URL)
      ? validateUrl('NOMINATIM_URL', env.NOMINATIM_URL.trim())
      : API_CONFIG.NOMINATIM_URL,
    userAgent: present(env.GEOCODER_USER_AGENT) ? env.GEOCODER_USER_AGENT.trim() : API_CONFIG.USER_AGENT,
    geocoderMinIntervalMs: present(env.GEOCODER_MIN_INTERVAL_MS)
      ? parseIntegerSetting(
          'GEOCODER_MIN_INTERVAL_MS',
          env.GEOCODER_MIN_INTERVAL_MS,
          VALIDATION_LIMITS.MIN_GEOCODER_INTERVAL_MS,
          60000
        )
      : API_CONFIG.GEOCODER_MIN_INTERVAL_MS,
    tripSolverTimeoutMs: present(env.TRIP_SOLVER_TIMEOUT_MS)
      ? parseIntegerSetting('TRIP_SOLVER_TIMEOUT_MS', env.TRIP_SOLVER_TIMEOUT_MS, 1000, 300000)
      : API_CONFIG.TRIP_SOLVER_TIMEOUT,
    clusterStrategy: present(env.CLUSTER_STRATEGY) ? validateClusterStrategy(env.CLUSTER_STRATEGY) : 'greedy',
    maxStopsPerRoute: present(env.MAX_STOPS_PER_ROUTE)
      ? parseIntegerSetting('MAX_STOPS_PER_ROUTE', env.MAX_STOPS_PER_ROUTE, 1, VALIDATION_LIMITS.MAX_STOPS_PER_ROUTE)
      : ROUTING_DEFAULTS.MAX_STOPS_PER_ROUTE
  }

  if (openRouteApiKey) {
    config.openRouteApiKey = openRouteApiKey
  }
  if (tripSolverUrl) {
    config.tripSolverUrl = tripSolverUrl
  }
  if (present(env.REDIS_URL)) {
    config.redisUrl = env.REDIS_URL.trim()
  }

  return config
}
