import { PARAMETER_CONTROLS } from './defaults'
import type { ParameterControl, ParameterName, Parameters } from './types'

export function getParameterControl(name: ParameterName): ParameterControl {
  const control = PARAMETER_CONTROLS.find((entry) => entry.name === name)
  if (!control) {
    throw new Error(`Unknown parameter "${name}".`)
  }
  return control
}

function stepDecimals(step: number): number {
  const [, fraction] = String(step).split('.')
  return fraction ? fraction.length : 0
}

/**
 * Bring a raw control value into its declared range, snapped to the control step.
 * Returns null for values that are not finite numbers.
 */
export function clampParameter(name: ParameterName, value: number): number | null {
  if (!Number.isFinite(value)) return null
  const { min, max, step } = getParameterControl(name)
  const bounded = Math.min(max, Math.max(min, value))
  const snapped = min + Math.round((bounded - min) / step) * step
  return Number(Math.min(max, snapped).toFixed(stepDecimals(step)))
}

export function applyParameterPatch(
  parameters: Parameters,
  patch: Partial<Parameters> | undefined
): Parameters {
  if (!patch) return parameters
  let changed = false
  const next: Record<ParameterName, number> = { ...parameters }
  for (const control of PARAMETER_CONTROLS) {
    const value = patch[control.name]
    if (value === undefined || !Number.isFinite(value)) continue
    if (value !== next[control.name]) changed = true
    next[control.name] = value
  }
  return changed ? next : parameters
}
