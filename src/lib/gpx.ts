import { createExportError } from './errors'
import { isValidCoordinate } from './geometry'
import { formatPhone } from './phone'
import type { Coordinate, Route, Stop } from './types'
import { displayAddress } from './types'

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
}

// Characters XML 1.0 cannot carry at all
const INVALID_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g

export const escapeXml = (value: string): string =>
  value.replace(INVALID_XML_CHARS, '').replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char)

export const formatCoordinateValue = (value: number): string => value.toFixed(6)

export const routeTitle = (route: Route): string => `Delivery Route ${route.index}`

export const routeFilename = (route: Route): string => `route_${route.index}.gpx`

export const deliveryCount = (route: Route): number => route.stops.filter((stop) => !stop.isDepot).length

// OsmAnd symbol names
const DEPOT_SYMBOL = 'Flag, Blue'
const DELIVERY_SYMBOL = 'Flag, Green'

/**
 * Label shown on the device for each waypoint. Deliveries are numbered from
 * 1 regardless of whether the route starts at a depot.
 */
export const waypointLabels = (route: Route): string[] => {
  let delivery = 0
  return route.stops.map((stop, index) => {
    if (stop.isDepot) {
      const marker = index === 0 ? 'START' : 'END'
      const depotName = stop.query.name?.trim()
      return depotName ? `${marker}: ${depotName}` : marker
    }
    delivery++
    const name = stop.query.name?.trim()
    return name ? `${delivery}. ${name}` : `Stop ${delivery}`
  })
}

export const describeStop = (stop: Stop): string => {
  const lines = [displayAddress(stop.query)]
  if (stop.isDepot) {
    return lines[0]
  }

  lines.push(`Phone: ${formatPhone(stop.query.phone)}`)
  if (stop.query.householdSize !== undefined) {
    lines.push(`Household: ${stop.query.householdSize}`)
  }
  if (stop.query.specialItems) {
    lines.push(`Special: ${stop.query.specialItems}`)
  }
  if (stop.query.notes) {
    lines.push(`Notes: ${stop.query.notes}`)
  }
  return lines.join('\n')
}

const validateRoute = (route: Route): void => {
  if (route.stops.length === 0) {
    throw createExportError(`route ${route.index} has no stops`, { routeIndex: route.index })
  }
  const invalid = route.stops.find((stop) => !isValidCoordinate(stop))
  if (invalid) {
    throw createExportError(`route ${route.index} has an invalid coordinate at stop ${invalid.sequenceNumber}`, {
      routeIndex: route.index,
      sequenceNumber: invalid.sequenceNumber
    })
  }
  if (!Number.isFinite(route.totalDistanceMiles)) {
    throw createExportError(`route ${route.index} has a non-finite distance`, { routeIndex: route.index })
  }
}

const pointAttributes = (coordinate: Coordinate): string =>
  `lat="${formatCoordinateValue(coordinate.latitude)}" lon="${formatCoordinateValue(coordinate.longitude)}"`

/**
 * GPX 1.1 document for one route: metadata, a waypoint per stop and a single
 * track through the stops in visiting order. The output depends only on the
 * route, so the same route always serializes to the same bytes.
 *
 * @throws AppError EXPORT_SERIALIZATION_ERROR for empty routes or invalid coordinates
 */
export const buildRouteGpx = (route: Route, creator = 'delivery-route-planner'): string => {
  validateRoute(route)

  const title = routeTitle(route)
  const labels = waypointLabels(route)
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<gpx version="1.1" creator="${escapeXml(creator)}" xmlns="http://www.topografix.com/GPX/1/1">`,
    '  <metadata>',
    `    <name>${escapeXml(title)}</name>`,
    `    <desc>${deliveryCount(route)} stops, ${route.totalDistanceMiles.toFixed(1)} miles</desc>`,
    '  </metadata>'
  ]

  route.stops.forEach((stop, index) => {
    lines.push(
      `  <wpt ${pointAttributes(stop)}>`,
      `    <name>${escapeXml(labels[index])}</name>`,
      `    <desc>${escapeXml(describeStop(stop))}</desc>`,
      `    <sym>${stop.isDepot ? DEPOT_SYMBOL : DELIVERY_SYMBOL}</sym>`,
      '  </wpt>'
    )
  })

  lines.push('  <trk>', `    <name>${escapeXml(title)}</name>`, '    <trkseg>')
  for (const stop of route.stops) {
    lines.push(`      <trkpt ${pointAttributes(stop)}/>`)
  }
  lines.push('    </trkseg>', '  </trk>', '</gpx>', '')

  return lines.join('\n')
}

const TRACK_POINT_PATTERN = /<trkpt\s+lat="([^"]+)"\s+lon="([^"]+)"/g

/**
 * Track point coordinates of a GPX document, in document order
 */
export const parseGpxWaypoints = (xml: string): Coordinate[] => {
  const points: Coordinate[] = []
  for (const match of xml.matchAll(TRACK_POINT_PATTERN)) {
    points.push({ latitude: Number(match[1]), longitude: Number(match[2]) })
  }
  return points
}
