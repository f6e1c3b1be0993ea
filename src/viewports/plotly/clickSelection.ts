import type { State } from '../../system/types'
import type { PlotlyPointClick } from './PlotlyViewport'

function toCoordinate(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

/**
 * Read a phase-space click as a new initial condition. Clicks without usable
 * coordinates resolve to null and are ignored downstream.
 */
export function resolveClickPoint(point: PlotlyPointClick | null | undefined): State | null {
  if (!point) return null
  const prey = toCoordinate(point.x)
  const predator = toCoordinate(point.y)
  if (prey === null || predator === null) return null
  return [prey, predator]
}
