/**
 * Application-wide constants for the delivery route planner
 */

// Distance Model Constants
export const DISTANCE_MODEL = {
  /**
   * Empirical factor turning straight-line distance into expected road distance
   */
  ROAD_DISTANCE_MULTIPLIER: 1.35,

  METERS_PER_MILE: 1609.344,
} as const

// Routing Defaults
export const ROUTING_DEFAULTS = {
  /**
   * Default number of deliveries assigned to one route
   */
  MAX_STOPS_PER_ROUTE: 10,

  /**
   * Upper bound on address variations queried per address
   */
  MAX_VARIATIONS: 7,

  /**
   * Candidates requested from the geocoding provider per query
   */
  CANDIDATE_LIMIT: 5,

  /**
   * Retries for timeouts and unavailable responses, per variation
   */
  MAX_RETRIES: 2,

  /**
   * Base delay for exponential retry backoff (milliseconds)
   */
  RETRY_BACKOFF_MS: 1000,

  COUNTRY_SUFFIX: 'USA',

  /**
   * Lloyd iterations for the centroid clustering strategy
   */
  CENTROID_ITERATIONS: 10,

  /**
   * Concurrent trip-solver requests across clusters
   */
  MAX_CONCURRENT_SOLVES: 4,
} as const

// Validation Constants
export const VALIDATION_LIMITS = {
  /**
   * Nominatim's usage policy allows at most one request per second
   */
  MIN_GEOCODER_INTERVAL_MS: 1000,

  MAX_STOPS_PER_ROUTE: 500,

  MAX_RADIUS_MILES: 1000,

  MAX_VARIATIONS: 10,
} as const

// API Configuration Constants
export const API_CONFIG = {
  NOMINATIM_URL: 'https://nominatim.openstreetmap.org',

  OPENROUTE_URL: 'https://api.openrouteservice.org',

  TRIP_SOLVER_URL: 'https://router.project-osrm.org',

  USER_AGENT: 'delivery-route-planner/1.0',

  /**
   * Minimum spacing between geocoding requests (milliseconds)
   */
  GEOCODER_MIN_INTERVAL_MS: 1100,

  /**
   * Default timeout for geocoding (milliseconds)
   */
  GEOCODING_TIMEOUT: 10000,

  /**
   * Default timeout for trip optimization (milliseconds)
   */
  TRIP_SOLVER_TIMEOUT: 30000,

  /**
   * Geocoding cache TTL (seconds)
   */
  GEOCODING_CACHE_TTL: 7 * 24 * 60 * 60,
} as const
