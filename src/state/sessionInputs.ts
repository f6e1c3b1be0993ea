import type { Parameters, State } from '../system/types'

/**
 * Everything that can trigger a recompute. A missing `click`, or a null one for a
 * click without usable coordinates, leaves the stored initial condition alone.
 */
export type SessionInputs = {
  parameters?: Partial<Parameters>
  click?: State | null
}

/** Combine two batches; later parameter values and a later valid click win. */
export function mergeSessionInputs(earlier: SessionInputs, later: SessionInputs): SessionInputs {
  const parameters =
    earlier.parameters || later.parameters
      ? { ...earlier.parameters, ...later.parameters }
      : undefined
  const click = later.click ?? earlier.click
  return {
    ...(parameters ? { parameters } : {}),
    ...(click !== undefined ? { click } : {}),
  }
}

export function isWellFormedClick(click: SessionInputs['click']): click is State {
  if (!click) return false
  return Number.isFinite(click[0]) && Number.isFinite(click[1])
}
