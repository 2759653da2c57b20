import { roadMiles } from '../geometry'
import type { MatchedGeocodeResult } from '../types'

import { NearestNeighborSolver, nearestNeighborSolver } from './nearestNeighbor'

const stop = (label: string, latitude: number, longitude: number): MatchedGeocodeResult => ({
  query: { address: label },
  status: 'MATCHED',
  latitude,
  longitude,
  displayName: label,
  matchedQuery: label
})

describe('NearestNeighborSolver', () => {
  const depot = stop('Depot', 44.0, -93.0)
  const a = stop('A', 44.1, -93.0)
  const b = stop('B', 44.2, -93.0)
  const c = stop('C', 44.3, -93.0)

  let solver: NearestNeighborSolver

  beforeEach(() => {
    solver = new NearestNeighborSolver()
  })

  it('should visit the closest remaining stop first, starting from the depot', () => {
    const plan = solver.planTour([c, a, b], depot)

    expect(plan.order).toEqual([1, 2, 0])
    expect(plan.distanceMiles).toBe(
      roadMiles(depot, a) + roadMiles(a, b) + roadMiles(b, c) + roadMiles(c, depot)
    )
  })

  it('should start at the first member and not close the loop without a depot', () => {
    const plan = solver.planTour([a, c, b])

    expect(plan.order).toEqual([0, 2, 1])
    expect(plan.distanceMiles).toBe(roadMiles(a, b) + roadMiles(b, c))
  })

  it('should count the trip out and back for a single stop', () => {
    const plan = solver.planTour([b], depot)

    expect(plan.order).toEqual([0])
    expect(plan.distanceMiles).toBe(2 * roadMiles(depot, b))
  })

  it('should prefer the lower index between stops at the same place', () => {
    const twin = stop('Twin', 44.1, -93.0)

    expect(solver.planTour([c, twin, a], depot).order).toEqual([1, 2, 0])
  })

  it('should return an empty plan for no members', () => {
    expect(solver.planTour([], depot)).toEqual({ order: [], distanceMiles: 0 })
  })

  it('should resolve the same plan through solve', async () => {
    await expect(nearestNeighborSolver.solve({ members: [c, a, b], depot })).resolves.toEqual(
      solver.planTour([c, a, b], depot)
    )
    expect(nearestNeighborSolver.external).toBe(false)
    expect(nearestNeighborSolver.name).toBe('nearest-neighbor')
  })
})
