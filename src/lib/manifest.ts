import { deliveryCount, routeFilename } from './gpx'
import { roundTo } from './geometry'
import { formatPhone } from './phone'
import type { Route, RouteSet } from './types'
import { displayAddress } from './types'

export interface ManifestStop {
  sequence: number
  name: string | null
  address: string
  displayName: string
  latitude: number
  longitude: number
  phone: string
  householdSize: number | null
  itemsNeeded: string | null
  specialItems: string | null
  notes: string | null
}

export interface ManifestRoute {
  routeNumber: number
  filename: string
  stopCount: number
  totalDistanceMiles: number
  estimatedDurationMinutes: number | null
  solver: string
  degraded: boolean
  stops: ManifestStop[]
}

export interface RouteManifest {
  depotAddress: string | null
  totalRoutes: number
  totalStops: number
  totalDistanceMiles: number
  routes: ManifestRoute[]
}

const RULE = '='.repeat(70)
const DIVIDER = '-'.repeat(70)

const depotOf = (routeSet: RouteSet): string | null => {
  for (const route of routeSet) {
    const depot = route.stops.find((stop) => stop.isDepot)
    if (depot) {
      return displayAddress(depot.query)
    }
  }
  return null
}

const manifestRoute = (route: Route): ManifestRoute => {
  let sequence = 0
  const stops: ManifestStop[] = []
  for (const stop of route.stops) {
    if (stop.isDepot) continue
    sequence++
    stops.push({
      sequence,
      name: stop.query.name ?? null,
      address: displayAddress(stop.query),
      displayName: stop.displayName,
      latitude: stop.latitude,
      longitude: stop.longitude,
      phone: formatPhone(stop.query.phone),
      householdSize: stop.query.householdSize ?? null,
      itemsNeeded: stop.query.itemsNeeded ?? null,
      specialItems: stop.query.specialItems ?? null,
      notes: stop.query.notes ?? null
    })
  }

  return {
    routeNumber: route.index,
    filename: routeFilename(route),
    stopCount: deliveryCount(route),
    totalDistanceMiles: roundTo(route.totalDistanceMiles, 2),
    estimatedDurationMinutes: route.estimatedDurationMinutes ?? null,
    solver: route.solver,
    degraded: route.degraded,
    stops
  }
}

/**
 * Structured summary of every route, ready for JSON serialization
 */
export const buildManifest = (routeSet: RouteSet): RouteManifest => {
  const routes = routeSet.map(manifestRoute)
  return {
    depotAddress: depotOf(routeSet),
    totalRoutes: routes.length,
    totalStops: routes.reduce((sum, route) => sum + route.stopCount, 0),
    totalDistanceMiles: roundTo(
      routes.reduce((sum, route) => sum + route.totalDistanceMiles, 0),
      2
    ),
    routes
  }
}

/**
 * Plain-text manifest for printing. Same content as {@link buildManifest}.
 */
export const formatManifestText = (manifest: RouteManifest): string => {
  const lines = [RULE, 'DELIVERY ROUTE MANIFEST', RULE, '']

  if (manifest.depotAddress) {
    lines.push(`Depot: ${manifest.depotAddress}`, '')
  }

  lines.push(
    `Total Routes: ${manifest.totalRoutes}`,
    `Total Stops: ${manifest.totalStops}`,
    `Total Distance: ${manifest.totalDistanceMiles.toFixed(1)} miles`,
    '',
    DIVIDER,
    ''
  )

  for (const route of manifest.routes) {
    lines.push(`ROUTE ${route.routeNumber}`, `Stops: ${route.stopCount}`, `Distance: ${route.totalDistanceMiles.toFixed(1)} miles`)
    if (route.estimatedDurationMinutes !== null) {
      lines.push(`Est. Duration: ${route.estimatedDurationMinutes.toFixed(0)} min`)
    }
    lines.push('')

    for (const stop of route.stops) {
      lines.push(`  ${stop.sequence}. ${stop.name ?? stop.address}`, `     ${stop.address}`, `     Phone: ${stop.phone}`)
      if (stop.specialItems) {
        lines.push(`     Special: ${stop.specialItems}`)
      }
      lines.push('')
    }

    lines.push(DIVIDER, '')
  }

  return lines.join('\n')
}
