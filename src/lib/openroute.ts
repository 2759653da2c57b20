import {
  createApiKeyError,
  createGeocodeProviderError,
  createHttpStatusError,
  createMissingApiKeyError,
  normalizeRequestError
} from './errors'
import { API_CONFIG } from './constants'
import { isInRange, type GeocodeCandidate, type GeocodingProvider } from './geocodingProvider'
import { logger } from './logger'

export interface OpenRouteGeocoderOptions {
  apiKey?: string
  baseUrl?: string
  timeoutMs?: number
  /** Restrict results to one country, ISO 3166 alpha-3 (e.g. "USA") */
  country?: string
}

export const isValidApiKeyFormat = (key: string): boolean => {
  // OpenRouteService keys are base64-like strings of reasonable length
  if (key.length < 20) {
    return false
  }

  const base64Regex = /^[A-Za-z0-9+/=]+$/
  return base64Regex.test(key)
}

const SERVICE_NAME = 'OpenRouteService'

const parseFeature = (feature: unknown): GeocodeCandidate | null => {
  if (typeof feature !== 'object' || feature === null) return null
  if (!('geometry' in feature) || typeof feature.geometry !== 'object' || feature.geometry === null) return null
  if (!('coordinates' in feature.geometry) || !Array.isArray(feature.geometry.coordinates)) return null

  const [longitude, latitude] = feature.geometry.coordinates
  if (typeof latitude !== 'number' || typeof longitude !== 'number' || !isInRange(latitude, longitude)) {
    return null
  }

  let displayName = `${latitude}, ${longitude}`
  if ('properties' in feature && typeof feature.properties === 'object' && feature.properties !== null) {
    if ('label' in feature.properties && typeof feature.properties.label === 'string') {
      displayName = feature.properties.label
    }
  }

  return { latitude, longitude, displayName }
}

/**
 * Address search through the OpenRouteService (Pelias) geocoding endpoint
 */
export class OpenRouteGeocodingProvider implements GeocodingProvider {
  readonly name = 'openroute'
  private apiKey: string
  private baseUrl: string
  private geocodingTimeout: number
  private country?: string

  constructor(options: OpenRouteGeocoderOptions = {}) {
    const apiKey = options.apiKey ?? process.env.OPENROUTE_SERVICE_API_KEY
    if (!apiKey) {
      throw createMissingApiKeyError('OPENROUTE_SERVICE_API_KEY')
    }

    if (!isValidApiKeyFormat(apiKey)) {
      throw createApiKeyError('Invalid API key format')
    }

    this.apiKey = apiKey
    this.baseUrl = options.baseUrl ?? API_CONFIG.OPENROUTE_URL
    this.geocodingTimeout = options.timeoutMs ?? API_CONFIG.GEOCODING_TIMEOUT
    this.country = options.country
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<GeocodeCandidate[]> {
    const params = new URLSearchParams({
      api_key: this.apiKey,
      text: query,
      size: String(limit),
      layers: 'address,venue,street'
    })
    if (this.country) {
      params.set('boundary.country', this.country)
    }

    const timeout = AbortSignal.timeout(this.geocodingTimeout)

    try {
      logger.debug({ query }, 'OpenRouteService geocoding request')

      const response = await fetch(`${this.baseUrl}/geocode/search?${params}`, {
        method: 'GET',
        headers: {
          Accept: 'application/json'
        },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout
      })

      if (!response.ok) {
        const errorText = await response.text()
        logger.error(`OpenRouteService geocoding API error: ${response.status} - ${errorText}`)
        throw createHttpStatusError(SERVICE_NAME, response.status, errorText, (detail) =>
          createGeocodeProviderError(SERVICE_NAME, detail)
        )
      }

      const data: unknown = await response.json()
      if (typeof data !== 'object' || data === null || !('features' in data) || !Array.isArray(data.features)) {
        throw createGeocodeProviderError(SERVICE_NAME, 'Invalid response: missing features array')
      }

      const candidates: GeocodeCandidate[] = []
      for (const feature of data.features) {
        const candidate = parseFeature(feature)
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
