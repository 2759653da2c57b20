import type { GeocodeCandidate } from './cache'

export type { GeocodeCandidate } from './cache'

/**
 * An external address search service. Implementations return zero or more
 * candidates, best first, and throw AppError on transport or API failures.
 * They perform no rate limiting of their own; callers dispatch through a
 * RateGate.
 */
export interface GeocodingProvider {
  readonly name: string
  /** `signal` is the caller's deadline; implementations add their own per-call timeout */
  search(query: string, limit: number, signal?: AbortSignal): Promise<GeocodeCandidate[]>
}

export const isInRange = (latitude: number, longitude: number): boolean =>
  Number.isFinite(latitude) &&
  Number.isFinite(longitude) &&
  latitude >= -90 &&
  latitude <= 90 &&
  longitude >= -180 &&
  longitude <= 180
