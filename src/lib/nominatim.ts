import { API_CONFIG } from './constants'
import { createGeocodeProviderError, createHttpStatusError, normalizeRequestError } from './errors'
import { isInRange, type GeocodeCandidate, type GeocodingProvider } from './geocodingProvider'
import { logger } from './logger'

export interface NominatimOptions {
  baseUrl?: string
  /** Nominatim's usage policy requires an identifying User-Agent */
  userAgent?: string
  timeoutMs?: number
  /** Comma-separated ISO 3166-1 alpha-2 codes, e.g. "us" */
  countryCodes?: string
}

const SERVICE_NAME = 'Nominatim'

const parsePlace = (place: unknown): GeocodeCandidate | null => {
  if (typeof place !== 'object' || place === null) return null
  if (!('lat' in place) || !('lon' in place)) return null

  // Nominatim serializes coordinates as strings
  const latitude = Number(place.lat)
  const longitude = Number(place.lon)
  if (!isInRange(latitude, longitude)) return null

  const displayName =
    'display_name' in place && typeof place.display_name === 'string'
      ? place.display_name
      : `${latitude}, ${longitude}`

  return { latitude, longitude, displayName }
}

/**
 * Address search against an OpenStreetMap Nominatim instance
 */
export class NominatimGeocodingProvider implements GeocodingProvider {
  readonly name = 'nominatim'
  private readonly baseUrl: string
  private readonly userAgent: string
  private readonly timeoutMs: number
  private readonly countryCodes?: string

  constructor(options: NominatimOptions = {}) {
    this.baseUrl = (options.baseUrl ?? API_CONFIG.NOMINATIM_URL).replace(/\/+$/, '')
    this.userAgent = options.userAgent ?? API_CONFIG.USER_AGENT
    this.timeoutMs = options.timeoutMs ?? API_CONFIG.GEOCODING_TIMEOUT
    this.countryCodes = options.countryCodes
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<GeocodeCandidate[]> {
    const params = new URLSearchParams({
      q: query,
      format: 'jsonv2',
      limit: String(limit)
    })
    if (this.countryCodes) {
      params.set('countrycodes', this.countryCodes)
    }

    const timeout = AbortSignal.timeout(this.timeoutMs)

    try {
      logger.debug({ query }, 'Nominatim search request')

      const response = await fetch(`${this.baseUrl}/search?${params}`, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'User-Agent': this.userAgent
        },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout
      })

      if (!response.ok) {
        const errorText = await response.text()
        logger.error(`Nominatim search error: ${response.status} - ${errorText}`)
        throw createHttpStatusError(SERVICE_NAME, response.status, errorText, (detail) =>
          createGeocodeProviderError(SERVICE_NAME, detail)
        )
      }

      const data: unknown = await response.json()
      if (!Array.isArray(data)) {
        throw createGeocodeProviderError(SERVICE_NAME, 'Invalid response: expected an array of places')
      }

      const candidates: GeocodeCandidate[] = []
      for (const place of data) {
        const candidate = parsePlace(place)
        if (candidate) {
          candidates.push(candidate)
        }
      }
      return candidates.slice(0, limit)
    } catch (error) {
      throw normalizeRequestError(error, 'Geocoding', (detail, originalError) =>
        createGeocodeProviderError(SERVICE_NAME, detail, originalError)
      )
    }
  }
}
