import type {
  Eigenvalue,
  Equilibrium,
  EquilibriumKind,
  Parameters,
  State,
  Trajectory,
} from '../system/types'
import { jacobian } from './vectorField'

const ZERO_TOLERANCE = 1e-12

function eigenvalues2x2(matrix: [[number, number], [number, number]]): [Eigenvalue, Eigenvalue] {
  const [[a, b], [c, d]] = matrix
  const trace = a + d
  const det = a * d - b * c
  const discriminant = trace * trace - 4 * det
  if (discriminant >= 0) {
    const root = Math.sqrt(discriminant)
    return [
      { re: (trace + root) / 2, im: 0 },
      { re: (trace - root) / 2, im: 0 },
    ]
  }
  const root = Math.sqrt(-discriminant)
  return [
    { re: trace / 2, im: root / 2 },
    { re: trace / 2, im: -root / 2 },
  ]
}

function classify(pair: [Eigenvalue, Eigenvalue]): EquilibriumKind {
  const [first, second] = pair
  if (Math.abs(first.im) > ZERO_TOLERANCE) {
    return Math.abs(first.re) <= ZERO_TOLERANCE ? 'center' : 'focus'
  }
  return first.re * second.re < 0 ? 'saddle' : 'node'
}

function equilibriumAt(
  label: Equilibrium['label'],
  state: State,
  parameters: Parameters
): Equilibrium {
  const eigenvalues = eigenvalues2x2(jacobian(state, parameters))
  return { label, state, eigenvalues, kind: classify(eigenvalues) }
}

export function coexistenceEquilibrium(parameters: Parameters): State {
  return [parameters.gamma / parameters.delta, parameters.alpha / parameters.beta]
}

export function findEquilibria(parameters: Parameters): Equilibrium[] {
  return [
    equilibriumAt('extinction', [0, 0], parameters),
    equilibriumAt('coexistence', coexistenceEquilibrium(parameters), parameters),
  ]
}

/**
 * First integral of the flow; constant along exact trajectories in the open
 * positive quadrant and NaN outside it.
 */
export function conservedQuantity(state: State, parameters: Parameters): number {
  const [x, y] = state
  if (!(x > 0) || !(y > 0)) return Number.NaN
  const { alpha, beta, gamma, delta } = parameters
  return delta * x - gamma * Math.log(x) + beta * y - alpha * Math.log(y)
}

/** Period of small oscillations around the coexistence point. */
export function linearizedPeriod(parameters: Parameters): number {
  return (2 * Math.PI) / Math.sqrt(parameters.alpha * parameters.gamma)
}

/**
 * Largest relative change of the first integral along a trajectory, a proxy for
 * integration error. NaN when the trajectory leaves the positive quadrant.
 */
export function conservedQuantityDrift(trajectory: Trajectory, parameters: Parameters): number {
  if (trajectory.length === 0) return 0
  const reference = conservedQuantity(trajectory[0], parameters)
  let drift = 0
  for (const state of trajectory) {
    const value = conservedQuantity(state, parameters)
    if (Number.isNaN(value) || Number.isNaN(reference)) return Number.NaN
    drift = Math.max(drift, Math.abs(value - reference) / Math.max(Math.abs(reference), 1e-12))
  }
  return drift
}
