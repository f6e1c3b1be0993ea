import { integrate, type AdaptiveSolverOptions } from '../math/odesolvers/dormandPrince'
import { lotkaVolterra } from '../math/vectorField'
import type { Parameters, State, TimeGrid, Trajectory } from '../system/types'

export type SimulateTrajectoryRequest = {
  parameters: Parameters
  initialCondition: State
  timeGrid: TimeGrid
}

export interface SimulationEngine {
  simulateTrajectory(request: SimulateTrajectoryRequest): Trajectory
}

/** Integrates the Lotka-Volterra field in-process on the calling thread. */
export class LocalSimulationEngine implements SimulationEngine {
  private solverOptions?: AdaptiveSolverOptions

  constructor(solverOptions?: AdaptiveSolverOptions) {
    this.solverOptions = solverOptions
  }

  simulateTrajectory(request: SimulateTrajectoryRequest): Trajectory {
    const rows = integrate(
      lotkaVolterra,
      request.initialCondition,
      request.timeGrid,
      request.parameters,
      this.solverOptions
    )
    return rows.map(([prey, predator]): State => [prey, predator])
  }
}
