import { setTimeout as sleep } from 'node:timers/promises'

import { createAddressVariations } from './addressVariations'
import type { GeocodeCacheService } from './cache'
import { ROUTING_DEFAULTS, VALIDATION_LIMITS } from './constants'
import {
  AppError,
  createDeadlineError,
  createEmptyAddressError,
  createGeocodeNotFoundError,
  createGeocodeOutOfRadiusError,
  createGeocodeProviderError,
  createInvalidConfigurationError,
  ErrorCode,
  isTransientError,
  toError
} from './errors'
import { geodesicMiles, roundTo } from './geometry'
import type { GeocodeCandidate, GeocodingProvider } from './geocodingProvider'
import { logger } from './logger'
import type { RateGate } from './rateGate'
import type {
  Coordinate,
  FailedGeocodeResult,
  GeocodeResult,
  MatchedGeocodeResult,
  OutOfRadiusGeocodeResult,
  StopInput
} from './types'

export interface GeocoderOptions {
  provider: GeocodingProvider
  /** Shared dispatch gate for every outbound provider call */
  gate: RateGate
  cache?: GeocodeCacheService
  maxVariations?: number
  maxRetries?: number
  retryBackoffMs?: number
  candidateLimit?: number
  countrySuffix?: string
  /** Backoff between retries; must reject once `signal` aborts */
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export interface GeocodeRequestOptions {
  /** Index of the depot address in the input list */
  depotIndex?: number
  /** Straight-line limit around the depot, applied when the depot matches */
  radiusMiles?: number
  /** Request deadline; once aborted, unfinished addresses resolve to ERROR */
  signal?: AbortSignal
}

interface RadiusFilter {
  center: Coordinate
  miles: number
}

interface NearestRejected {
  candidate: GeocodeCandidate
  query: string
  distanceMiles: number
}

export const normalizeStopInput = (input: string | StopInput): StopInput =>
  typeof input === 'string' ? { address: input, originalAddress: input } : { ...input }

const failed = (
  query: StopInput,
  status: FailedGeocodeResult['status'],
  error: AppError
): FailedGeocodeResult => ({
  query,
  status,
  errorDetail: error.message,
  errorCode: error.code
})

/**
 * Geocoder resolves addresses to coordinates one result per input, in input
 * order. Provider failures are returned as ERROR results; the method only
 * throws for invalid request options.
 */
export class Geocoder {
  private readonly provider: GeocodingProvider
  private readonly gate: RateGate
  private readonly cache?: GeocodeCacheService
  private readonly maxVariations: number
  private readonly maxRetries: number
  private readonly retryBackoffMs: number
  private readonly candidateLimit: number
  private readonly countrySuffix?: string
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>

  constructor(options: GeocoderOptions) {
    this.provider = options.provider
    this.gate = options.gate
    this.cache = options.cache
    this.maxVariations = options.maxVariations ?? ROUTING_DEFAULTS.MAX_VARIATIONS
    if (
      !Number.isInteger(this.maxVariations) ||
      this.maxVariations < 1 ||
      this.maxVariations > VALIDATION_LIMITS.MAX_VARIATIONS
    ) {
      throw createInvalidConfigurationError(
        'maxVariations',
        `must be an integer between 1 and ${VALIDATION_LIMITS.MAX_VARIATIONS}`
      )
    }
    this.maxRetries = options.maxRetries ?? ROUTING_DEFAULTS.MAX_RETRIES
    this.retryBackoffMs = options.retryBackoffMs ?? ROUTING_DEFAULTS.RETRY_BACKOFF_MS
    this.candidateLimit = options.candidateLimit ?? ROUTING_DEFAULTS.CANDIDATE_LIMIT
    this.countrySuffix = options.countrySuffix
    this.wait = options.wait ?? (async (ms, signal) => {
      await sleep(ms, undefined, { signal })
    })
  }

  get providerName(): string {
    return this.provider.name
  }

  async geocode(
    inputs: ReadonlyArray<string | StopInput>,
    options: GeocodeRequestOptions = {}
  ): Promise<GeocodeResult[]> {
    const { depotIndex, radiusMiles, signal } = options
    this.validateRequest(inputs.length, depotIndex, radiusMiles)

    if (inputs.length === 0) {
      return []
    }

    const stops = inputs.map(normalizeStopInput)
    logger.info({ count: stops.length, depotIndex, radiusMiles }, 'Geocoding addresses')

    // The depot goes first: it is the centre of the radius filter
    let depotResult: GeocodeResult | undefined
    let radius: RadiusFilter | undefined
    if (depotIndex !== undefined) {
      const lookup = await this.lookup(stops[depotIndex], undefined, signal)
      depotResult = lookup
      if (lookup.status === 'MATCHED') {
        const depot: MatchedGeocodeResult = { ...lookup, distanceFromDepotMiles: 0 }
        depotResult = depot
        if (radiusMiles !== undefined) {
          radius = { center: depot, miles: radiusMiles }
        }
      } else {
        logger.warn({ address: stops[depotIndex].address }, 'Depot address could not be geocoded; radius filter disabled')
      }
    }

    const results = await Promise.all(
      stops.map((stop, index) =>
        index === depotIndex && depotResult ? Promise.resolve(depotResult) : this.lookup(stop, radius, signal)
      )
    )

    const matched = results.filter((result) => result.status === 'MATCHED').length
    logger.info({ matched, failed: results.length - matched }, 'Geocoding complete')

    return results
  }

  private validateRequest(count: number, depotIndex?: number, radiusMiles?: number): void {
    if (depotIndex !== undefined && (!Number.isInteger(depotIndex) || depotIndex < 0 || depotIndex >= count)) {
      throw createInvalidConfigurationError('depotIndex', `must be an index into the ${count} addresses`)
    }

    if (
      radiusMiles !== undefined &&
      (!Number.isFinite(radiusMiles) || radiusMiles <= 0 || radiusMiles > VALIDATION_LIMITS.MAX_RADIUS_MILES)
    ) {
      throw createInvalidConfigurationError(
        'radiusMiles',
        `must be greater than 0 and at most ${VALIDATION_LIMITS.MAX_RADIUS_MILES}`
      )
    }
  }

  /**
   * Try each address variation until one yields an acceptable candidate.
   * Precedence when nothing matches: OUT_OF_RADIUS, then ERROR, then NO_MATCH.
   */
  private async lookup(stop: StopInput, radius?: RadiusFilter, signal?: AbortSignal): Promise<GeocodeResult> {
    const variations = createAddressVariations(stop.address, {
      maxVariations: this.maxVariations,
      countrySuffix: this.countrySuffix
    })

    if (variations.length === 0) {
      return failed(stop, 'NO_MATCH', createEmptyAddressError())
    }

    let nearestRejected: NearestRejected | undefined
    let lastError: AppError | undefined
    let tried = 0

    for (const variation of variations) {
      if (signal?.aborted) {
        lastError = createDeadlineError()
        break
      }

      tried++
      let candidates: GeocodeCandidate[]
      try {
        candidates = await this.search(variation, signal)
      } catch (error) {
        lastError =
          error instanceof AppError
            ? error
            : createGeocodeProviderError(this.provider.name, toError(error).message, toError(error))
        logger.warn({ address: stop.address, variation, code: lastError.code }, 'Geocoding attempt failed')
        if (!isTransientError(lastError)) {
          break
        }
        continue
      }

      for (const candidate of candidates) {
        if (!radius) {
          return this.matched(stop, candidate, variation)
        }

        const distanceMiles = geodesicMiles(radius.center, candidate)
        if (distanceMiles <= radius.miles) {
          return this.matched(stop, candidate, variation, distanceMiles)
        }

        if (!nearestRejected || distanceMiles < nearestRejected.distanceMiles) {
          nearestRejected = { candidate, query: variation, distanceMiles }
        }
      }
    }

    if (nearestRejected && radius) {
      return this.outOfRadius(stop, nearestRejected, radius.miles)
    }

    if (lastError) {
      return failed(stop, 'ERROR', lastError)
    }

    logger.info({ address: stop.address, variations: tried }, 'No geocoding match')
    return failed(stop, 'NO_MATCH', createGeocodeNotFoundError(stop.address, tried))
  }

  private matched(
    stop: StopInput,
    candidate: GeocodeCandidate,
    query: string,
    distanceMiles?: number
  ): MatchedGeocodeResult {
    return {
      query: stop,
      status: 'MATCHED',
      latitude: candidate.latitude,
      longitude: candidate.longitude,
      displayName: candidate.displayName,
      matchedQuery: query,
      ...(distanceMiles !== undefined && { distanceFromDepotMiles: roundTo(distanceMiles, 1) })
    }
  }

  private outOfRadius(stop: StopInput, rejected: NearestRejected, radiusMiles: number): OutOfRadiusGeocodeResult {
    const error = createGeocodeOutOfRadiusError(stop.address, rejected.distanceMiles, radiusMiles)
    return {
      query: stop,
      status: 'OUT_OF_RADIUS',
      latitude: rejected.candidate.latitude,
      longitude: rejected.candidate.longitude,
      displayName: rejected.candidate.displayName,
      matchedQuery: rejected.query,
      distanceFromDepotMiles: roundTo(rejected.distanceMiles, 1),
      errorDetail: error.message,
      errorCode: ErrorCode.GEOCODE_OUT_OF_RADIUS
    }
  }

  private async search(query: string, signal?: AbortSignal): Promise<GeocodeCandidate[]> {
    const cached = await this.readCache(query)
    if (cached) {
      return cached
    }

    const candidates = await this.searchWithRetry(query, signal)
    if (candidates.length > 0) {
      await this.writeCache(query, candidates)
    }
    return candidates
  }

  /**
   * A call still queued in the gate when the deadline fires is never sent.
   * Anything that fails after the deadline reports DEADLINE_EXCEEDED, which
   * is not retried.
   */
  private async searchWithRetry(query: string, signal?: AbortSignal): Promise<GeocodeCandidate[]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.gate.schedule(async () => {
          if (signal?.aborted) {
            throw createDeadlineError()
          }
          return this.provider.search(query, this.candidateLimit, signal)
        })
      } catch (error) {
        if (signal?.aborted) {
          throw createDeadlineError()
        }
        if (!isTransientError(error) || attempt >= this.maxRetries) {
          throw error
        }
        const delay = this.retryBackoffMs * 2 ** attempt
        logger.warn({ query, attempt: attempt + 1, delay }, 'Transient geocoding failure, retrying')
        try {
          await this.wait(delay, signal)
        } catch (waitError) {
          if (signal?.aborted) {
            throw createDeadlineError()
          }
          throw waitError
        }
      }
    }
  }

  private async readCache(query: string): Promise<GeocodeCandidate[] | null> {
    if (!this.cache) return null
    try {
      return await this.cache.getGeocodingCache(this.provider.name, query)
    } catch (error) {
      logger.warn({ err: error }, 'Geocoding cache unavailable, querying provider directly')
      return null
    }
  }

  private async writeCache(query: string, candidates: GeocodeCandidate[]): Promise<void> {
    if (!this.cache) return
    try {
      await this.cache.setGeocodingCache(this.provider.name, query, candidates)
    } catch (error) {
      logger.warn({ err: error }, 'Failed to cache geocoding result')
    }
  }
}
