import type {
  DisplayBounds,
  DisplayVariant,
  ParameterControl,
  Parameters,
  SimulationConfig,
  State,
} from './types'

export const DEFAULT_PARAMETERS: Parameters = {
  alpha: 1.0,
  beta: 0.1,
  gamma: 1.5,
  delta: 0.075,
}

export const DEFAULT_INITIAL_CONDITION: State = [10.0, 5.0]

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  tEnd: 100,
  points: 1000,
  frameCount: 100,
}

export const PARAMETER_CONTROLS: readonly ParameterControl[] = [
  { name: 'alpha', symbol: 'α', label: 'Prey growth rate', min: 0.1, max: 2.0, step: 0.1 },
  { name: 'beta', symbol: 'β', label: 'Predation rate', min: 0.01, max: 0.5, step: 0.01 },
  { name: 'gamma', symbol: 'γ', label: 'Predator death rate', min: 0.1, max: 2.0, step: 0.1 },
  { name: 'delta', symbol: 'δ', label: 'Predator growth rate', min: 0.01, max: 0.2, step: 0.01 },
]

export const DISPLAY_BOUNDS: Record<DisplayVariant, DisplayBounds> = {
  static: { prey: [0, 100], predator: [0, 100] },
  animated: { prey: [0, 100], predator: [0, 50] },
}

/** Points per axis in the invisible click-target grid. */
export const SELECTION_GRID_SIZE = 100
