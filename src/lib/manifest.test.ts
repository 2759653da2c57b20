import { buildManifest, formatManifestText } from './manifest'
import { buildRoute } from './routeOptimizer'
import type { MatchedGeocodeResult, StopInput } from './types'

const matched = (query: StopInput, latitude: number, longitude: number): MatchedGeocodeResult => ({
  query,
  status: 'MATCHED',
  latitude,
  longitude,
  displayName: `${query.address}, MN`,
  matchedQuery: query.address
})

const depot = matched({ address: '100 Depot Rd, Town' }, 44.0, -93.0)
const ada = matched(
  {
    address: '12 Oak St, Town',
    originalAddress: '12 Oak St., Town',
    name: 'Ada & Co',
    phone: '1-612-555-0100',
    householdSize: 4,
    itemsNeeded: 'Produce',
    specialItems: 'Diapers'
  },
  44.1,
  -93.1
)
const pine = matched({ address: '9 Pine St, Town' }, 44.2, -93.2)
const elm = matched({ address: '7 Elm St, Town', name: 'Bo', phone: '555-0199' }, 44.3, -93.3)

const routes = [
  buildRoute(
    { id: 1, members: [ada, pine], anchor: depot },
    { order: [0, 1], distanceMiles: 12.34, durationMinutes: 45.26 },
    'osrm',
    false
  ),
  buildRoute({ id: 2, members: [elm], anchor: depot }, { order: [0], distanceMiles: 3.5 }, 'nearest-neighbor', true)
]

describe('route manifest', () => {
  describe('buildManifest', () => {
    it('should summarize every route and its deliveries', () => {
      const manifest = buildManifest(routes)

      expect(manifest).toMatchObject({
        depotAddress: '100 Depot Rd, Town',
        totalRoutes: 2,
        totalStops: 3,
        totalDistanceMiles: 15.84
      })
      expect(manifest.routes[0]).toMatchObject({
        routeNumber: 1,
        filename: 'route_1.gpx',
        stopCount: 2,
        totalDistanceMiles: 12.34,
        estimatedDurationMinutes: 45.3,
        solver: 'osrm',
        degraded: false
      })
      expect(manifest.routes[1]).toMatchObject({ estimatedDurationMinutes: null, degraded: true })
      expect(manifest.routes[0].stops[0]).toEqual({
        sequence: 1,
        name: 'Ada & Co',
        address: '12 Oak St., Town',
        displayName: '12 Oak St, Town, MN',
        latitude: 44.1,
        longitude: -93.1,
        phone: '(612) 555-0100',
        householdSize: 4,
        itemsNeeded: 'Produce',
        specialItems: 'Diapers',
        notes: null
      })
      expect(manifest.routes[0].stops[1]).toMatchObject({ sequence: 2, name: null, phone: 'N/A' })
    })

    it('should leave the depot empty for routes without one', () => {
      const open = buildRoute({ id: 1, members: [pine] }, { order: [0], distanceMiles: 0 }, 'nearest-neighbor', false)

      expect(buildManifest([open])).toMatchObject({ depotAddress: null, totalStops: 1 })
    })

    it('should handle an empty route set', () => {
      expect(buildManifest([])).toEqual({
        depotAddress: null,
        totalRoutes: 0,
        totalStops: 0,
        totalDistanceMiles: 0,
        routes: []
      })
    })
  })

  describe('formatManifestText', () => {
    it('should lay out a printable summary', () => {
      const rule = '='.repeat(70)
      const divider = '-'.repeat(70)

      expect(formatManifestText(buildManifest(routes))).toBe(
        [
          rule,
          'DELIVERY ROUTE MANIFEST',
          rule,
          '',
          'Depot: 100 Depot Rd, Town',
          '',
          'Total Routes: 2',
          'Total Stops: 3',
          'Total Distance: 15.8 miles',
          '',
          divider,
          '',
          'ROUTE 1',
          'Stops: 2',
          'Distance: 12.3 miles',
          'Est. Duration: 45 min',
          '',
          '  1. Ada & Co',
          '     12 Oak St., Town',
          '     Phone: (612) 555-0100',
          '     Special: Diapers',
          '',
          '  2. 9 Pine St, Town',
          '     9 Pine St, Town',
          '     Phone: N/A',
          '',
          divider,
          '',
          'ROUTE 2',
          'Stops: 1',
          'Distance: 3.5 miles',
          '',
          '  1. Bo',
          '     7 Elm St, Town',
          '     Phone: 555-0199',
          '',
          divider,
          ''
        ].join('\n')
      )
    })
  })
})
