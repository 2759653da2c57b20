import { createGeocodeCache, generateGeocodingCacheKey, InMemoryCache, RedisCache, type GeocodeCandidate } from './cache'

const mockRedisState = { open: false }

const mockRedisClient = {
  get isOpen() {
    return mockRedisState.open
  },
  connect: jest.fn(async () => {
    mockRedisState.open = true
  }),
  quit: jest.fn(async () => {
    mockRedisState.open = false
  }),
  get: jest.fn(),
  set: jest.fn(),
  setEx: jest.fn(),
  del: jest.fn(),
  keys: jest.fn(),
  on: jest.fn()
}

jest.mock('redis', () => ({
  createClient: jest.fn(() => mockRedisClient)
}))

const candidates: GeocodeCandidate[] = [
  { latitude: 44.9778, longitude: -93.265, displayName: 'Main Street, Minneapolis' }
]

describe('Cache Service', () => {
  describe('generateGeocodingCacheKey', () => {
    it('should normalize case and whitespace', () => {
      expect(generateGeocodingCacheKey('nominatim', '  123 Main   St, Minneapolis ')).toBe(
        'geocoding:nominatim:123 main st, minneapolis'
      )
    })

    it('should separate providers', () => {
      expect(generateGeocodingCacheKey('openroute', 'a')).not.toBe(generateGeocodingCacheKey('nominatim', 'a'))
    })
  })

  describe('InMemoryCache', () => {
    let cache: InMemoryCache

    beforeEach(() => {
      cache = new InMemoryCache()
    })

    it('should return cached candidates for an equivalent query', async () => {
      await cache.setGeocodingCache('nominatim', '123 Main St', candidates)

      await expect(cache.getGeocodingCache('nominatim', '123  main st')).resolves.toEqual(candidates)
    })

    it('should track hits, misses and entries', async () => {
      await cache.getGeocodingCache('nominatim', 'unknown')
      await cache.setGeocodingCache('nominatim', 'known', candidates)
      await cache.setGeocodingCache('nominatim', 'known', candidates)
      await cache.getGeocodingCache('nominatim', 'known')

      await expect(cache.getCacheStats()).resolves.toEqual({
        geocodingHits: 1,
        geocodingMisses: 1,
        totalEntries: 1
      })
    })

    it('should expire entries after their TTL', async () => {
      const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000)
      await cache.setGeocodingCache('nominatim', 'expiring', candidates, 60)

      now.mockReturnValue(1_000_000 + 59_000)
      await expect(cache.getGeocodingCache('nominatim', 'expiring')).resolves.toEqual(candidates)

      now.mockReturnValue(1_000_000 + 61_000)
      await expect(cache.getGeocodingCache('nominatim', 'expiring')).resolves.toBeNull()
      await expect(cache.getCacheStats()).resolves.toMatchObject({ totalEntries: 0 })

      now.mockRestore()
    })

    it('should treat corrupt entries as misses', async () => {
      await cache.set(generateGeocodingCacheKey('nominatim', 'broken'), '{not json')
      await cache.set(generateGeocodingCacheKey('nominatim', 'wrong-shape'), JSON.stringify([{ lat: 1 }]))

      await expect(cache.getGeocodingCache('nominatim', 'broken')).resolves.toBeNull()
      await expect(cache.getGeocodingCache('nominatim', 'wrong-shape')).resolves.toBeNull()
      await expect(cache.getCacheStats()).resolves.toMatchObject({ geocodingMisses: 2 })
    })

    it('should delete and clear entries', async () => {
      await cache.set('a', '1')
      await cache.set('b', '2')
      await cache.del('a')

      await expect(cache.get('a')).resolves.toBeNull()
      await expect(cache.get('b')).resolves.toBe('2')

      await cache.clear()
      await expect(cache.get('b')).resolves.toBeNull()
      await expect(cache.getCacheStats()).resolves.toEqual({ geocodingHits: 0, geocodingMisses: 0, totalEntries: 0 })
    })
  })

  describe('RedisCache', () => {
    beforeEach(() => {
      jest.clearAllMocks()
      mockRedisState.open = false
    })

    it('should connect lazily and read entries', async () => {
      mockRedisClient.get.mockResolvedValue(JSON.stringify(candidates))
      const cache = new RedisCache('redis://localhost:6379')

      expect(mockRedisClient.connect).not.toHaveBeenCalled()

      await expect(cache.getGeocodingCache('nominatim', '123 Main St')).resolves.toEqual(candidates)
      await cache.getGeocodingCache('nominatim', '123 Main St')

      expect(mockRedisClient.connect).toHaveBeenCalledTimes(1)
      expect(mockRedisClient.get).toHaveBeenCalledWith('geocoding:nominatim:123 main st')
    })

    it('should write entries with a seven day expiry', async () => {
      const cache = new RedisCache('redis://localhost:6379')

      await cache.setGeocodingCache('nominatim', 'Depot', candidates)

      expect(mockRedisClient.setEx).toHaveBeenCalledWith('geocoding:nominatim:depot', 604800, JSON.stringify(candidates))
    })

    it('should remove only geocoding keys on clear', async () => {
      mockRedisClient.keys.mockResolvedValue(['geocoding:nominatim:a', 'geocoding:nominatim:b'])
      const cache = new RedisCache('redis://localhost:6379')

      await cache.clear()

      expect(mockRedisClient.keys).toHaveBeenCalledWith('geocoding:*')
      expect(mockRedisClient.del).toHaveBeenCalledWith(['geocoding:nominatim:a', 'geocoding:nominatim:b'])
    })

    it('should quit an open connection on disconnect', async () => {
      const cache = new RedisCache('redis://localhost:6379')

      await cache.disconnect()
      expect(mockRedisClient.quit).not.toHaveBeenCalled()

      await cache.connect()
      await cache.disconnect()
      expect(mockRedisClient.quit).toHaveBeenCalledTimes(1)
    })
  })

  describe('createGeocodeCache', () => {
    it('should use Redis only when a URL is configured', () => {
      expect(createGeocodeCache()).toBeInstanceOf(InMemoryCache)
      expect(createGeocodeCache('redis://localhost:6379')).toBeInstanceOf(RedisCache)
    })
  })
})
