import type { SimulationEngine } from '../compute/SimulationEngine'
import { IntegrationFailure } from '../math/odesolvers/dormandPrince'
import { DEFAULT_INITIAL_CONDITION, DEFAULT_PARAMETERS } from '../system/defaults'
import { applyParameterPatch } from '../system/parameters'
import type { RenderPayload, SessionState, TimeGrid } from '../system/types'
import { isWellFormedClick, type SessionInputs } from './sessionInputs'

export type SessionOutcome =
  | { status: 'rendered'; payload: RenderPayload }
  | { status: 'failed'; error: IntegrationFailure }

export type SessionStep = {
  state: SessionState
  outcome: SessionOutcome
}

export type SessionDeps = {
  engine: SimulationEngine
  timeGrid: TimeGrid
}

export function createSessionState(): SessionState {
  return {
    parameters: DEFAULT_PARAMETERS,
    initialCondition: DEFAULT_INITIAL_CONDITION,
  }
}

/**
 * Apply one batch of inputs to the session record. Parameters always take their
 * latest values; a well-formed click replaces the stored initial condition.
 */
export function resolveSessionState(state: SessionState, inputs: SessionInputs): SessionState {
  const parameters = applyParameterPatch(state.parameters, inputs.parameters)
  const initialCondition = isWellFormedClick(inputs.click)
    ? ([inputs.click[0], inputs.click[1]] as const)
    : state.initialCondition
  return { parameters, initialCondition }
}

/**
 * One recompute cycle: resolve the effective inputs, integrate, and return the
 * next session record with what to render.
 *
 * On an integration failure the parameters still advance (they mirror the
 * controls) but the previous initial condition is kept.
 */
export function triggerSession(
  state: SessionState,
  inputs: SessionInputs,
  deps: SessionDeps
): SessionStep {
  const resolved = resolveSessionState(state, inputs)
  try {
    const trajectory = deps.engine.simulateTrajectory({
      parameters: resolved.parameters,
      initialCondition: resolved.initialCondition,
      timeGrid: deps.timeGrid,
    })
    return {
      state: resolved,
      outcome: {
        status: 'rendered',
        payload: {
          trajectory,
          initialCondition: resolved.initialCondition,
          parameters: resolved.parameters,
          timeGrid: deps.timeGrid,
        },
      },
    }
  } catch (err) {
    if (!(err instanceof IntegrationFailure)) throw err
    return {
      state: { parameters: resolved.parameters, initialCondition: state.initialCondition },
      outcome: { status: 'failed', error: err },
    }
  }
}

export class SimulationSession {
  private deps: SessionDeps
  private current: SessionState

  constructor(deps: SessionDeps, initialState: SessionState = createSessionState()) {
    this.deps = deps
    this.current = initialState
  }

  get state(): SessionState {
    return this.current
  }

  trigger(inputs: SessionInputs = {}): SessionOutcome {
    const step = triggerSession(this.current, inputs, this.deps)
    this.current = step.state
    return step.outcome
  }

  reset(): SessionOutcome {
    this.current = createSessionState()
    return this.trigger()
  }
}
