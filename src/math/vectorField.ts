import type { Parameters, State } from '../system/types'

/**
 * Right-hand side of the system on phase space.
 * `t` is unused by autonomous fields but kept so solvers can pass it uniformly.
 */
export type VectorField<P> = (state: readonly number[], t: number, parameters: P) => number[]

/**
 * Lotka-Volterra predator-prey equations:
 *   dx/dt = alpha*x - beta*x*y
 *   dy/dt = -gamma*y + delta*x*y
 */
export const lotkaVolterra: VectorField<Parameters> = (state, _t, parameters) => {
  const [x, y] = state
  const { alpha, beta, gamma, delta } = parameters
  return [alpha * x - beta * x * y, -gamma * y + delta * x * y]
}

export function jacobian(state: State, parameters: Parameters): [[number, number], [number, number]] {
  const [x, y] = state
  const { alpha, beta, gamma, delta } = parameters
  return [
    [alpha - beta * y, -beta * x],
    [delta * y, -gamma + delta * x],
  ]
}
