import type { TimeGrid } from './types'

/** Evenly spaced samples over [0, tEnd], both ends included. */
export function createTimeGrid(tEnd: number, points: number): TimeGrid {
  if (!Number.isFinite(tEnd) || tEnd <= 0) {
    throw new Error('Time grid end must be a positive number.')
  }
  if (!Number.isInteger(points) || points < 2) {
    throw new Error('Time grid needs at least two points.')
  }
  const last = points - 1
  return Array.from({ length: points }, (_, index) =>
    index === last ? tEnd : (tEnd * index) / last
  )
}
