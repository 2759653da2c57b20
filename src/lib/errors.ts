import { logger } from './logger'

export enum ErrorCode {
  // API Configuration Errors
  INVALID_API_KEY = 'INVALID_API_KEY',
  MISSING_API_KEY = 'MISSING_API_KEY',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',

  // Input Validation Errors
  INVALID_COORDINATES = 'INVALID_COORDINATES',
  CLUSTER_CONFIG_INVALID = 'CLUSTER_CONFIG_INVALID',
  NO_GEOCODED_LOCATIONS = 'NO_GEOCODED_LOCATIONS',

  // Geocoding Errors
  GEOCODE_NOT_FOUND = 'GEOCODE_NOT_FOUND',
  GEOCODE_OUT_OF_RADIUS = 'GEOCODE_OUT_OF_RADIUS',
  GEOCODE_PROVIDER_ERROR = 'GEOCODE_PROVIDER_ERROR',

  // Route Optimization Errors
  OPTIMIZE_PROVIDER_TIMEOUT = 'OPTIMIZE_PROVIDER_TIMEOUT',
  OPTIMIZE_PROVIDER_ERROR = 'OPTIMIZE_PROVIDER_ERROR',
  ROUTE_OPTIMIZATION_FAILED = 'ROUTE_OPTIMIZATION_FAILED',

  // Export Errors
  EXPORT_SERIALIZATION_ERROR = 'EXPORT_SERIALIZATION_ERROR',

  // External API Errors
  API_RATE_LIMIT = 'API_RATE_LIMIT',
  API_TIMEOUT = 'API_TIMEOUT',
  API_UNAVAILABLE = 'API_UNAVAILABLE',
  DEADLINE_EXCEEDED = 'DEADLINE_EXCEEDED',

  // Generic Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR'
}

export interface StructuredError {
  code: ErrorCode
  message: string
  userMessage: string
  details?: Record<string, unknown>
  originalError?: Error
}

export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly userMessage: string
  public readonly details?: Record<string, unknown>
  public readonly originalError?: Error

  constructor(error: StructuredError) {
    super(error.message)
    this.name = 'AppError'
    this.code = error.code
    this.userMessage = error.userMessage
    this.details = error.details
    this.originalError = error.originalError
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      details: this.details
    }
  }
}

// Provider failures worth another attempt after a pause
const TRANSIENT_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.API_RATE_LIMIT,
  ErrorCode.API_TIMEOUT,
  ErrorCode.API_UNAVAILABLE,
  ErrorCode.NETWORK_ERROR
])

export const isTransientError = (error: unknown): boolean =>
  error instanceof AppError && TRANSIENT_ERROR_CODES.has(error.code)

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))

// Error factory functions for common error scenarios
export const createApiKeyError = (details?: string): AppError => {
  return new AppError({
    code: ErrorCode.INVALID_API_KEY,
    message: `Invalid API key: ${details || 'API key validation failed'}`,
    userMessage: 'Configuration error: Invalid API key for mapping service. Please check your API key configuration.',
    details: { apiKeyIssue: details }
  })
}

export const createMissingApiKeyError = (variable: string): AppError => {
  return new AppError({
    code: ErrorCode.MISSING_API_KEY,
    message: `${variable} environment variable is required`,
    userMessage: 'Configuration error: Missing API key for mapping service. Please configure your API key.',
    details: { variable }
  })
}

export const createRateLimitError = (service: string): AppError => {
  return new AppError({
    code: ErrorCode.API_RATE_LIMIT,
    message: `${service} rate limit exceeded`,
    userMessage: 'Service temporarily unavailable due to rate limits. Please try again in a few minutes.',
    details: { service }
  })
}

export const createTimeoutError = (operation: string): AppError => {
  return new AppError({
    code: ErrorCode.API_TIMEOUT,
    message: `${operation} request timed out`,
    userMessage: 'Request timed out. Please try again with fewer addresses.',
    details: { operation }
  })
}

export const createServiceUnavailableError = (service: string, status: number, errorText: string): AppError => {
  return new AppError({
    code: ErrorCode.API_UNAVAILABLE,
    message: `${service} server error: ${status}`,
    userMessage: 'Mapping service is temporarily unavailable. Please try again later.',
    details: { service, status, errorText }
  })
}

export const createNetworkError = (operation: string, originalError: Error): AppError => {
  return new AppError({
    code: ErrorCode.NETWORK_ERROR,
    message: `Network error during ${operation}`,
    userMessage: 'Network connection failed. Please check your internet connection and try again.',
    details: { operation },
    originalError
  })
}

export const createDeadlineError = (): AppError => {
  return new AppError({
    code: ErrorCode.DEADLINE_EXCEEDED,
    message: 'Request deadline exceeded',
    userMessage: 'The request took too long and was stopped before every address was processed.'
  })
}

export const createInvalidConfigurationError = (field: string, reason: string): AppError => {
  return new AppError({
    code: ErrorCode.INVALID_CONFIGURATION,
    message: `Invalid ${field}: ${reason}`,
    userMessage: 'The routing request has invalid settings. Please check them and try again.',
    details: { field, reason }
  })
}

export const createInvalidCoordinatesError = (coordinates: unknown): AppError => {
  return new AppError({
    code: ErrorCode.INVALID_COORDINATES,
    message: 'Invalid coordinate values provided',
    userMessage: 'Invalid coordinates. Latitude must be between -90 and 90, longitude between -180 and 180.',
    details: { coordinates }
  })
}

export const createGeocodeNotFoundError = (address: string, variationsTried: number): AppError => {
  return new AppError({
    code: ErrorCode.GEOCODE_NOT_FOUND,
    message: `Address not found after ${variationsTried} variation(s): ${address}`,
    userMessage: `Unable to find a location for "${address}". Please check the spelling or try a more specific address.`,
    details: { address, variationsTried }
  })
}

export const createEmptyAddressError = (): AppError => {
  return new AppError({
    code: ErrorCode.GEOCODE_NOT_FOUND,
    message: 'Empty address',
    userMessage: 'A delivery row has no address.'
  })
}

export const createGeocodeOutOfRadiusError = (address: string, distanceMiles: number, radiusMiles: number): AppError => {
  return new AppError({
    code: ErrorCode.GEOCODE_OUT_OF_RADIUS,
    message: `Nearest match is ${distanceMiles.toFixed(1)} miles from the depot (limit ${radiusMiles} miles)`,
    userMessage: `"${address}" was found, but it is outside the ${radiusMiles} mile delivery radius.`,
    details: { address, distanceMiles, radiusMiles }
  })
}

export const createGeocodeProviderError = (provider: string, detail: string, originalError?: Error): AppError => {
  return new AppError({
    code: ErrorCode.GEOCODE_PROVIDER_ERROR,
    message: `${provider} geocoding failed: ${detail}`,
    userMessage: 'The address lookup service returned an error. Please try again.',
    details: { provider, detail },
    originalError
  })
}

export const createClusterConfigError = (maxStopsPerRoute: unknown): AppError => {
  return new AppError({
    code: ErrorCode.CLUSTER_CONFIG_INVALID,
    message: `maxStopsPerRoute must be an integer of at least 1, received ${String(maxStopsPerRoute)}`,
    userMessage: 'Stops per route must be a whole number of at least 1.',
    details: { maxStopsPerRoute }
  })
}

export const createNoGeocodedLocationsError = (failedCount: number): AppError => {
  return new AppError({
    code: ErrorCode.NO_GEOCODED_LOCATIONS,
    message: `No delivery locations could be geocoded (${failedCount} failed)`,
    userMessage: 'None of the delivery addresses could be located. Please review the failed addresses and try again.',
    details: { failedCount }
  })
}

export const createOptimizeTimeoutError = (solver: string, timeoutMs: number): AppError => {
  return new AppError({
    code: ErrorCode.OPTIMIZE_PROVIDER_TIMEOUT,
    message: `${solver} trip request timed out after ${timeoutMs}ms`,
    userMessage: 'The route optimization service did not answer in time.',
    details: { solver, timeoutMs }
  })
}

export const createOptimizeProviderError = (solver: string, detail: string, originalError?: Error): AppError => {
  return new AppError({
    code: ErrorCode.OPTIMIZE_PROVIDER_ERROR,
    message: `${solver} trip request failed: ${detail}`,
    userMessage: 'The route optimization service returned an error.',
    details: { solver, detail },
    originalError
  })
}

export const createRouteOptimizationError = (clusterId: number, failures: string[]): AppError => {
  return new AppError({
    code: ErrorCode.ROUTE_OPTIMIZATION_FAILED,
    message: `Every routing strategy failed for cluster ${clusterId}: ${failures.join('; ')}`,
    userMessage: `Route ${clusterId} could not be optimized. The other routes are unaffected.`,
    details: { clusterId, failures }
  })
}

export const createExportError = (detail: string, details?: Record<string, unknown>): AppError => {
  return new AppError({
    code: ErrorCode.EXPORT_SERIALIZATION_ERROR,
    message: `Route export failed: ${detail}`,
    userMessage: 'The route files could not be generated.',
    details
  })
}

/**
 * Map a non-2xx provider response onto the shared error taxonomy. Statuses
 * without a specific meaning become the caller's provider error.
 */
export const createHttpStatusError = (
  service: string,
  status: number,
  errorText: string,
  fallback: (detail: string) => AppError
): AppError => {
  if (status === 401) {
    return createApiKeyError(`Authentication failed with ${service}`)
  } else if (status === 403) {
    return createApiKeyError(`API key does not have permission for ${service}`)
  } else if (status === 429) {
    return createRateLimitError(service)
  } else if (status >= 500) {
    return createServiceUnavailableError(service, status, errorText)
  }
  return fallback(`API error: ${status} - ${errorText}`)
}

const errorName = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string'
    ? error.name
    : undefined

export const isTimeoutError = (error: unknown): boolean => errorName(error) === 'TimeoutError'

/**
 * Turn whatever a fetch call threw into an AppError: timeouts and network
 * failures get their own codes, anything else goes through `fallback`.
 */
export const normalizeRequestError = (
  error: unknown,
  operation: string,
  fallback: (detail: string, originalError: Error) => AppError
): AppError => {
  if (error instanceof AppError) {
    return error
  }

  if (isTimeoutError(error)) {
    return createTimeoutError(operation)
  }

  const original = toError(error)
  if (original.name === 'TypeError' && original.message.includes('fetch')) {
    return createNetworkError(operation, original)
  }

  return fallback(original.message, original)
}

// Error handler for service entry points
export const handleServiceError = (error: unknown, operation: string): never => {
  logger.error({ err: error, operation }, `Error in ${operation}`)

  if (error instanceof AppError) {
    throw error
  }

  throw new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: `Internal error in ${operation}`,
    userMessage: 'An unexpected error occurred. Please try again or contact support if the problem persists.',
    details: { operation },
    originalError: toError(error)
  })
}

// Utility to extract user-friendly error message from any error
export const getUserFriendlyMessage = (error: unknown): string => {
  if (error instanceof AppError) {
    return error.userMessage
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase()

    if (message.includes('api key')) {
      return 'Configuration error: Invalid API key for mapping service.'
    } else if (message.includes('rate limit')) {
      return 'Service temporarily unavailable due to rate limits. Please try again in a few minutes.'
    } else if (message.includes('timeout') || message.includes('timed out')) {
      return 'Request timed out. Please try again with fewer addresses.'
    }

    return error.message
  }

  return 'An unexpected error occurred. Please try again.'
}
