import { centroid } from '@turf/centroid'
import type { MultiPoint } from 'geojson'

import { DISTANCE_MODEL } from './constants'
import { createInvalidCoordinatesError } from './errors'
import type { Coordinate } from './types'

// WGS-84 ellipsoid
const SEMI_MAJOR_AXIS = 6378137
const FLATTENING = 1 / 298.257223563
const SEMI_MINOR_AXIS = SEMI_MAJOR_AXIS * (1 - FLATTENING)
const MEAN_EARTH_RADIUS = 6371008.8

const CONVERGENCE_THRESHOLD = 1e-12
const MAX_ITERATIONS = 200

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180

export const isValidCoordinate = (coordinate: Coordinate): boolean =>
  Number.isFinite(coordinate.latitude) &&
  Number.isFinite(coordinate.longitude) &&
  coordinate.latitude >= -90 &&
  coordinate.latitude <= 90 &&
  coordinate.longitude >= -180 &&
  coordinate.longitude <= 180

export const assertValidCoordinate = (coordinate: Coordinate): void => {
  if (!isValidCoordinate(coordinate)) {
    throw createInvalidCoordinatesError({
      latitude: coordinate.latitude,
      longitude: coordinate.longitude
    })
  }
}

/**
 * Great-circle distance on a sphere, used only when the ellipsoidal
 * iteration fails to converge (nearly antipodal points).
 */
const haversineMeters = (a: Coordinate, b: Coordinate): number => {
  const dLat = toRadians(b.latitude - a.latitude)
  const dLon = toRadians(b.longitude - a.longitude)
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.latitude)) * Math.cos(toRadians(b.latitude)) * Math.sin(dLon / 2) ** 2
  return 2 * MEAN_EARTH_RADIUS * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))
}

/**
 * Vincenty inverse solution on the WGS-84 ellipsoid.
 * Accurate to well under a millimetre for non-antipodal points.
 */
const vincentyMeters = (a: Coordinate, b: Coordinate): number => {
  const L = toRadians(b.longitude - a.longitude)
  const U1 = Math.atan((1 - FLATTENING) * Math.tan(toRadians(a.latitude)))
  const U2 = Math.atan((1 - FLATTENING) * Math.tan(toRadians(b.latitude)))
  const sinU1 = Math.sin(U1)
  const cosU1 = Math.cos(U1)
  const sinU2 = Math.sin(U2)
  const cosU2 = Math.cos(U2)

  let lambda = L
  let previousLambda = 0
  let iterations = 0
  let sinSigma = 0
  let cosSigma = 0
  let sigma = 0
  let cosSqAlpha = 0
  let cos2SigmaM = 0

  do {
    const sinLambda = Math.sin(lambda)
    const cosLambda = Math.cos(lambda)
    sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2
    )
    if (sinSigma === 0) {
      return 0
    }
    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda
    sigma = Math.atan2(sinSigma, cosSigma)
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma
    cosSqAlpha = 1 - sinAlpha * sinAlpha
    // Equatorial line: cosSqAlpha is zero
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0
    const C = (FLATTENING / 16) * cosSqAlpha * (4 + FLATTENING * (4 - 3 * cosSqAlpha))
    previousLambda = lambda
    lambda =
      L +
      (1 - C) *
        FLATTENING *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)))
  } while (Math.abs(lambda - previousLambda) > CONVERGENCE_THRESHOLD && ++iterations < MAX_ITERATIONS)

  if (iterations >= MAX_ITERATIONS) {
    return haversineMeters(a, b)
  }

  const uSq = (cosSqAlpha * (SEMI_MAJOR_AXIS ** 2 - SEMI_MINOR_AXIS ** 2)) / SEMI_MINOR_AXIS ** 2
  const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)))
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)))
  const deltaSigma =
    B *
    sinSigma *
    (cos2SigmaM +
      (B / 4) *
        (cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM) -
          (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * cos2SigmaM * cos2SigmaM)))

  return SEMI_MINOR_AXIS * A * (sigma - deltaSigma)
}

// Canonical argument order keeps the result bit-identical in both directions
const precedes = (a: Coordinate, b: Coordinate): boolean =>
  a.latitude < b.latitude || (a.latitude === b.latitude && a.longitude <= b.longitude)

/**
 * Straight-line distance over the ellipsoid, in miles. Used for radius
 * filtering; route building uses {@link roadMiles}.
 */
export const geodesicMiles = (a: Coordinate, b: Coordinate): number => {
  if (a.latitude === b.latitude && a.longitude === b.longitude) {
    return 0
  }
  const meters = precedes(a, b) ? vincentyMeters(a, b) : vincentyMeters(b, a)
  return meters / DISTANCE_MODEL.METERS_PER_MILE
}

/**
 * Estimated driving distance in miles: geodesic distance scaled by the fixed
 * road-network multiplier.
 */
export const roadMiles = (a: Coordinate, b: Coordinate): number =>
  geodesicMiles(a, b) * DISTANCE_MODEL.ROAD_DISTANCE_MULTIPLIER

/**
 * Sum of road miles between consecutive points
 */
export const pathRoadMiles = (points: readonly Coordinate[]): number => {
  let total = 0
  for (let i = 1; i < points.length; i++) {
    total += roadMiles(points[i - 1], points[i])
  }
  return total
}

/**
 * Arithmetic mean of a set of coordinates
 * @throws Error if no points are provided
 */
export const calculateCentroid = (points: readonly Coordinate[]): Coordinate => {
  if (points.length === 0) {
    throw new Error('No points provided for centroid calculation')
  }
  if (points.length === 1) {
    return { latitude: points[0].latitude, longitude: points[0].longitude }
  }

  const multiPoint: MultiPoint = {
    type: 'MultiPoint',
    coordinates: points.map((point) => [point.longitude, point.latitude])
  }
  const [longitude, latitude] = centroid(multiPoint).geometry.coordinates

  return { latitude, longitude }
}

/**
 * Index of the candidate nearest to `target` by road miles. Ties keep the
 * earliest candidate. Returns -1 for an empty list.
 */
export const findNearestIndex = <T extends Coordinate>(
  candidates: readonly T[],
  target: Coordinate
): number => {
  let bestIndex = -1
  let bestDistance = Infinity

  candidates.forEach((candidate, index) => {
    const distance = roadMiles(target, candidate)
    if (distance < bestDistance) {
      bestDistance = distance
      bestIndex = index
    }
  })

  return bestIndex
}

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals
  return Math.round(value * factor) / factor
}
