import {
  useCallback,
  useEffect,
  useMemo,
  useReducer,
  useRef,
  useState,
  type ReactNode,
} from 'react'
import type { SimulationEngine } from '../compute/SimulationEngine'
import { RecomputeScheduler, type RecomputeTiming } from '../compute/recomputeScheduler'
import { DEFAULT_SIMULATION_CONFIG, PARAMETER_CONTROLS } from '../system/defaults'
import { clampParameter } from '../system/parameters'
import { createTimeGrid } from '../system/timeGrid'
import type {
  ParameterName,
  Parameters,
  RenderPayload,
  SessionState,
  SimulationConfig,
  State,
} from '../system/types'
import { AppContext } from './appContext'
import { SimulationSession, type SessionOutcome } from './session'
import { mergeSessionInputs, type SessionInputs } from './sessionInputs'

export type AppState = {
  session: SessionState
  payload: RenderPayload | null
  error: string | null
  timings: RecomputeTiming[]
}

type AppAction =
  | { type: 'APPLY_OUTCOME'; session: SessionState; outcome: SessionOutcome }
  | { type: 'SET_ERROR'; error: string | null }
  | { type: 'ADD_TIMING'; timing: RecomputeTiming }

function formatFailure(outcome: Extract<SessionOutcome, { status: 'failed' }>): string {
  return `Integration failed: ${outcome.error.message}`
}

function reducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case 'APPLY_OUTCOME':
      if (action.outcome.status === 'failed') {
        // The last successful payload stays on screen.
        return { ...state, session: action.session, error: formatFailure(action.outcome) }
      }
      return {
        ...state,
        session: action.session,
        payload: action.outcome.payload,
        error: null,
      }
    case 'SET_ERROR':
      return { ...state, error: action.error }
    case 'ADD_TIMING':
      return { ...state, timings: [action.timing, ...state.timings].slice(0, 100) }
    default:
      return state
  }
}

function initialAppState(session: SimulationSession): AppState {
  const base: AppState = { session: session.state, payload: null, error: null, timings: [] }
  const outcome = session.trigger()
  return reducer(base, { type: 'APPLY_OUTCOME', session: session.state, outcome })
}

export type AppActions = {
  setParameter: (name: ParameterName, value: number) => void
  selectPhasePoint: (point: State | null) => void
  submitInputs: (inputs: SessionInputs) => void
  resetSession: () => void
  dismissError: () => void
}

export type AppContextValue = {
  state: AppState
  actions: AppActions
  config: SimulationConfig
}

export function AppProvider({
  engine,
  config = DEFAULT_SIMULATION_CONFIG,
  onTiming,
  children,
}: {
  engine: SimulationEngine
  config?: SimulationConfig
  onTiming?: (timing: RecomputeTiming) => void
  children: ReactNode
}) {
  const [session] = useState(
    () =>
      new SimulationSession({
        engine,
        timeGrid: createTimeGrid(config.tEnd, config.points),
      })
  )
  const [state, dispatch] = useReducer(reducer, session, initialAppState)
  const onTimingRef = useRef(onTiming)

  useEffect(() => {
    onTimingRef.current = onTiming
  }, [onTiming])

  const [scheduler] = useState(
    () =>
      new RecomputeScheduler<SessionInputs>(
        'recompute',
        mergeSessionInputs,
        (inputs) => {
          const outcome = session.trigger(inputs)
          if (outcome.status === 'failed') {
            console.warn(`[Simulation] ${outcome.error.message}`)
          }
          dispatch({ type: 'APPLY_OUTCOME', session: session.state, outcome })
          return outcome.status === 'rendered' ? 'completed' : 'failed'
        },
        (timing) => {
          dispatch({ type: 'ADD_TIMING', timing })
          onTimingRef.current?.(timing)
        }
      )
  )

  useEffect(() => {
    return () => {
      scheduler.cancel()
    }
  }, [scheduler])

  const setParameter = useCallback(
    (name: ParameterName, value: number) => {
      const clamped = clampParameter(name, value)
      if (clamped === null) return
      const patch: Partial<Record<ParameterName, number>> = {}
      patch[name] = clamped
      scheduler.submit({ parameters: patch })
    },
    [scheduler]
  )

  const selectPhasePoint = useCallback(
    (point: State | null) => {
      if (!point) return
      scheduler.submit({ click: point })
    },
    [scheduler]
  )

  const submitInputs = useCallback(
    (inputs: SessionInputs) => {
      let parameters: Partial<Parameters> | undefined
      if (inputs.parameters) {
        const clamped: Partial<Record<ParameterName, number>> = {}
        for (const { name } of PARAMETER_CONTROLS) {
          const value = inputs.parameters[name]
          if (value === undefined) continue
          const next = clampParameter(name, value)
          if (next !== null) clamped[name] = next
        }
        parameters = clamped
      }
      scheduler.submit({ ...inputs, parameters })
    },
    [scheduler]
  )

  const resetSession = useCallback(() => {
    scheduler.cancel()
    const outcome = session.reset()
    dispatch({ type: 'APPLY_OUTCOME', session: session.state, outcome })
  }, [scheduler, session])

  const dismissError = useCallback(() => {
    dispatch({ type: 'SET_ERROR', error: null })
  }, [])

  const actions = useMemo<AppActions>(
    () => ({ setParameter, selectPhasePoint, submitInputs, resetSession, dismissError }),
    [setParameter, selectPhasePoint, submitInputs, resetSession, dismissError]
  )

  const value = useMemo(() => ({ state, actions, config }), [state, actions, config])

  return <AppContext.Provider value={value}>{children}</AppContext.Provider>
}
