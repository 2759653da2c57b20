import type { ErrorCode } from './errors'

export interface Coordinate {
  latitude: number
  longitude: number
}

/**
 * One delivery as handed over by the upload collaborator. Only `address` is
 * used for lookup; the rest is carried through to the exported files.
 */
export interface StopInput {
  address: string
  /** Display label, defaults to `address` */
  originalAddress?: string
  name?: string
  phone?: string
  notes?: string
  householdSize?: number
  itemsNeeded?: string
  specialItems?: string
}

export type GeocodeStatus = 'MATCHED' | 'NO_MATCH' | 'OUT_OF_RADIUS' | 'ERROR'

interface GeocodeResultBase {
  readonly query: Readonly<StopInput>
  readonly status: GeocodeStatus
}

export interface MatchedGeocodeResult extends GeocodeResultBase, Readonly<Coordinate> {
  readonly status: 'MATCHED'
  readonly displayName: string
  /** The address variation the provider matched */
  readonly matchedQuery: string
  /** Straight-line miles from the depot, rounded to 0.1 */
  readonly distanceFromDepotMiles?: number
}

export interface OutOfRadiusGeocodeResult extends GeocodeResultBase, Readonly<Coordinate> {
  readonly status: 'OUT_OF_RADIUS'
  readonly displayName: string
  readonly matchedQuery: string
  readonly distanceFromDepotMiles: number
  readonly errorDetail: string
  readonly errorCode: ErrorCode
}

export interface FailedGeocodeResult extends GeocodeResultBase {
  readonly status: 'NO_MATCH' | 'ERROR'
  readonly errorDetail: string
  readonly errorCode: ErrorCode
}

export type GeocodeResult = MatchedGeocodeResult | OutOfRadiusGeocodeResult | FailedGeocodeResult

export type Depot = MatchedGeocodeResult

export interface Cluster {
  readonly id: number
  readonly members: readonly MatchedGeocodeResult[]
  readonly anchor?: Depot
}

export interface Stop extends MatchedGeocodeResult {
  readonly sequenceNumber: number
  readonly isDepot: boolean
}

export interface Route {
  readonly index: number
  readonly stops: readonly Stop[]
  readonly totalDistanceMiles: number
  readonly estimatedDurationMinutes?: number
  /** Name of the strategy that produced the visiting order */
  readonly solver: string
  /** True when a preferred strategy failed and a fallback produced the order */
  readonly degraded: boolean
}

export type RouteSet = readonly Route[]

export const isMatched = (result: GeocodeResult): result is MatchedGeocodeResult =>
  result.status === 'MATCHED'

export const displayAddress = (stop: Readonly<StopInput>): string =>
  stop.originalAddress ?? stop.address
