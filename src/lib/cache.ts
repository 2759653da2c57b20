import { createClient } from 'redis'

import { API_CONFIG } from './constants'
import { logger } from './logger'

/**
 * One provider candidate for an address query
 */
export interface GeocodeCandidate {
  latitude: number
  longitude: number
  displayName: string
}

export interface CacheStats {
  geocodingHits: number
  geocodingMisses: number
  totalEntries: number
}

export interface CacheService {
  get(key: string): Promise<string | null>
  set(key: string, value: string, ttl?: number): Promise<void>
  del(key: string): Promise<void>
  clear(): Promise<void>
}

export interface GeocodeCacheService extends CacheService {
  getGeocodingCache(provider: string, query: string): Promise<GeocodeCandidate[] | null>
  setGeocodingCache(provider: string, query: string, candidates: GeocodeCandidate[], ttl?: number): Promise<void>
  getCacheStats(): Promise<CacheStats>
  disconnect(): Promise<void>
}

export const generateGeocodingCacheKey = (provider: string, query: string): string =>
  `geocoding:${provider}:${query.toLowerCase().replace(/\s+/g, ' ').trim()}`

const emptyStats = (): CacheStats => ({
  geocodingHits: 0,
  geocodingMisses: 0,
  totalEntries: 0
})

const isGeocodeCandidate = (value: unknown): value is GeocodeCandidate => {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  return (
    'latitude' in value &&
    typeof value.latitude === 'number' &&
    'longitude' in value &&
    typeof value.longitude === 'number' &&
    'displayName' in value &&
    typeof value.displayName === 'string'
  )
}

// Cached payloads are re-validated so a corrupt entry reads as a miss
const parseCandidates = (payload: string): GeocodeCandidate[] | null => {
  try {
    const parsed: unknown = JSON.parse(payload)
    if (Array.isArray(parsed) && parsed.every(isGeocodeCandidate)) {
      return parsed
    }
  } catch (error) {
    logger.warn({ err: error }, 'Discarding unreadable geocoding cache entry')
  }
  return null
}

abstract class BaseGeocodeCache implements GeocodeCacheService {
  protected stats: CacheStats = emptyStats()

  abstract get(key: string): Promise<string | null>
  abstract set(key: string, value: string, ttl?: number): Promise<void>
  abstract del(key: string): Promise<void>
  abstract clear(): Promise<void>
  abstract disconnect(): Promise<void>

  async getGeocodingCache(provider: string, query: string): Promise<GeocodeCandidate[] | null> {
    const result = await this.get(generateGeocodingCacheKey(provider, query))
    const candidates = result ? parseCandidates(result) : null

    if (candidates) {
      this.stats.geocodingHits++
    } else {
      this.stats.geocodingMisses++
    }
    return candidates
  }

  async setGeocodingCache(
    provider: string,
    query: string,
    candidates: GeocodeCandidate[],
    ttl: number = API_CONFIG.GEOCODING_CACHE_TTL
  ): Promise<void> {
    await this.set(generateGeocodingCacheKey(provider, query), JSON.stringify(candidates), ttl)
  }

  async getCacheStats(): Promise<CacheStats> {
    return { ...this.stats }
  }
}

export class InMemoryCache extends BaseGeocodeCache {
  private cache = new Map<string, { value: string; expires?: number }>()

  async get(key: string): Promise<string | null> {
    const item = this.cache.get(key)
    if (!item) return null

    if (item.expires && Date.now() > item.expires) {
      this.cache.delete(key)
      this.stats.totalEntries = Math.max(0, this.stats.totalEntries - 1)
      return null
    }

    return item.value
  }

  async set(key: string, value: string, ttl?: number): Promise<void> {
    const expires = ttl ? Date.now() + ttl * 1000 : undefined
    const isNewKey = !this.cache.has(key)
    this.cache.set(key, { value, expires })

    if (isNewKey) {
      this.stats.totalEntries++
    }
  }

  async del(key: string): Promise<void> {
    if (this.cache.delete(key)) {
      this.stats.totalEntries = Math.max(0, this.stats.totalEntries - 1)
    }
  }

  async clear(): Promise<void> {
    this.cache.clear()
    this.stats = emptyStats()
  }

  async disconnect(): Promise<void> {
    this.cache.clear()
  }
}

export class RedisCache extends BaseGeocodeCache {
  private client: ReturnType<typeof createClient>

  constructor(url: string) {
    super()
    this.client = createClient({ url })
    this.client.on('error', (err: unknown) => logger.error({ err }, 'Redis client error'))
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect()
    }
  }

  async get(key: string): Promise<string | null> {
    await this.connect()
    return await this.client.get(key)
  }

  async set(key: string, value: string, ttl?: number): Promise<void> {
    await this.connect()
    if (ttl) {
      await this.client.setEx(key, ttl, value)
    } else {
      await this.client.set(key, value)
    }
  }

  async del(key: string): Promise<void> {
    await this.connect()
    await this.client.del(key)
  }

  async clear(): Promise<void> {
    await this.connect()
    const keys = await this.client.keys('geocoding:*')
    if (keys.length > 0) {
      await this.client.del(keys)
    }
    this.stats = emptyStats()
  }

  async disconnect(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit()
    }
  }
}

// Create cache instance based on environment
export const createGeocodeCache = (redisUrl?: string): GeocodeCacheService =>
  redisUrl ? new RedisCache(redisUrl) : new InMemoryCache()
