import type { VectorField } from '../vectorField'

export type IntegrationFailureReason =
  | 'non-finite-state'
  | 'step-size-underflow'
  | 'max-steps-exceeded'

/**
 * Raised when the solver cannot produce a finite, converged trajectory.
 * Callers get no partial output.
 */
export class IntegrationFailure extends Error {
  readonly reason: IntegrationFailureReason
  readonly t: number

  constructor(reason: IntegrationFailureReason, t: number, message: string) {
    super(message)
    this.name = 'IntegrationFailure'
    this.reason = reason
    this.t = t
  }
}

export type AdaptiveSolverOptions = {
  initialStep?: number
  minStep?: number
  maxStep?: number
  absoluteTolerance?: number
  relativeTolerance?: number
  maxSteps?: number
}

type ResolvedOptions = Required<AdaptiveSolverOptions>

const DEFAULT_OPTIONS: ResolvedOptions = {
  initialStep: 1e-2,
  minStep: 1e-10,
  maxStep: Number.POSITIVE_INFINITY,
  absoluteTolerance: 1e-9,
  relativeTolerance: 1e-7,
  maxSteps: 500_000,
}

const SAFETY = 0.9
const GROWTH_LIMIT = 5
const SHRINK_LIMIT = 0.2
const ERROR_EXPONENT = -0.2

// Dormand–Prince 5(4) tableau. The last stage is evaluated at the 5th-order
// solution, so B5 doubles as the final row of A.
const C = [0, 1 / 5, 3 / 10, 4 / 5, 8 / 9, 1, 1] as const
const A: ReadonlyArray<ReadonlyArray<number>> = [
  [],
  [1 / 5],
  [3 / 40, 9 / 40],
  [44 / 45, -56 / 15, 32 / 9],
  [19372 / 6561, -25360 / 2187, 64448 / 6561, -212 / 729],
  [9017 / 3168, -355 / 33, 46732 / 5247, 49 / 176, -5103 / 18656],
  [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84],
]
const B5 = [35 / 384, 0, 500 / 1113, 125 / 192, -2187 / 6784, 11 / 84, 0] as const
const B4 = [5179 / 57600, 0, 7571 / 16695, 393 / 640, -92097 / 339200, 187 / 2100, 1 / 40] as const

function isFiniteVector(values: readonly number[]): boolean {
  return values.every((value) => Number.isFinite(value))
}

function combine(base: readonly number[], stages: number[][], weights: readonly number[], h: number) {
  return base.map((value, component) => {
    let sum = 0
    for (let stage = 0; stage < weights.length; stage += 1) {
      const weight = weights[stage]
      if (weight !== 0) sum += weight * stages[stage][component]
    }
    return value + h * sum
  })
}

function attemptStep<P>(
  field: VectorField<P>,
  t: number,
  y: readonly number[],
  h: number,
  parameters: P
): { next: number[]; lower: number[] } {
  const stages: number[][] = [field(y, t, parameters)]
  for (let stage = 1; stage < C.length; stage += 1) {
    const point = combine(y, stages, A[stage], h)
    stages.push(field(point, t + C[stage] * h, parameters))
  }
  return {
    next: combine(y, stages, B5, h),
    lower: combine(y, stages, B4, h),
  }
}

function errorNorm(
  y: readonly number[],
  next: readonly number[],
  lower: readonly number[],
  options: ResolvedOptions
): number {
  let sum = 0
  for (let i = 0; i < y.length; i += 1) {
    const scale =
      options.absoluteTolerance +
      options.relativeTolerance * Math.max(Math.abs(y[i]), Math.abs(next[i]))
    const ratio = (next[i] - lower[i]) / scale
    sum += ratio * ratio
  }
  return Math.sqrt(sum / Math.max(1, y.length))
}

function assertTimeGrid(timeGrid: readonly number[]) {
  if (timeGrid.length === 0) {
    throw new Error('Time grid must contain at least one point.')
  }
  for (let i = 0; i < timeGrid.length; i += 1) {
    if (!Number.isFinite(timeGrid[i])) {
      throw new Error('Time grid values must be finite.')
    }
    if (i > 0 && timeGrid[i] <= timeGrid[i - 1]) {
      throw new Error('Time grid must be strictly increasing.')
    }
  }
}

/**
 * Integrate an initial-value problem with an adaptive Dormand–Prince 5(4) scheme,
 * sampling the solution at every point of `timeGrid`.
 *
 * Steps are clipped so the solver lands on each grid point exactly; row 0 is a
 * copy of `initialState`.
 */
export function integrate<P>(
  field: VectorField<P>,
  initialState: readonly number[],
  timeGrid: readonly number[],
  parameters: P,
  opts?: AdaptiveSolverOptions
): number[][] {
  assertTimeGrid(timeGrid)
  const options: ResolvedOptions = { ...DEFAULT_OPTIONS, ...opts }

  let t = timeGrid[0]
  if (!isFiniteVector(initialState)) {
    throw new IntegrationFailure('non-finite-state', t, 'Initial state must be finite.')
  }

  let y = [...initialState]
  const rows: number[][] = [[...initialState]]
  let h = Math.min(options.initialStep, options.maxStep)
  let steps = 0

  for (let index = 1; index < timeGrid.length; index += 1) {
    const target = timeGrid[index]
    while (t < target) {
      steps += 1
      if (steps > options.maxSteps) {
        throw new IntegrationFailure(
          'max-steps-exceeded',
          t,
          `Solver exceeded ${options.maxSteps} steps at t=${t.toPrecision(6)}.`
        )
      }

      const remaining = target - t
      const reachesTarget = h >= remaining
      const stepSize = reachesTarget ? remaining : h
      const { next, lower } = attemptStep(field, t, y, stepSize, parameters)
      const norm = isFiniteVector(next) ? errorNorm(y, next, lower, options) : Number.NaN

      if (Number.isFinite(norm) && norm <= 1) {
        t = reachesTarget ? target : t + stepSize
        y = next
        const factor =
          norm === 0 ? GROWTH_LIMIT : Math.min(GROWTH_LIMIT, SAFETY * norm ** ERROR_EXPONENT)
        // A step clipped to the grid says nothing about the achievable size.
        if (reachesTarget) continue
        h = Math.min(options.maxStep, stepSize * factor)
        if (h < options.minStep) {
          throw new IntegrationFailure(
            'step-size-underflow',
            t,
            `Step size fell to ${h.toExponential(2)} at t=${t.toPrecision(6)}.`
          )
        }
        continue
      }

      const factor = Number.isFinite(norm)
        ? Math.max(SHRINK_LIMIT, SAFETY * norm ** ERROR_EXPONENT)
        : SHRINK_LIMIT
      h = stepSize * factor
      if (h < options.minStep) {
        throw new IntegrationFailure(
          Number.isFinite(norm) ? 'step-size-underflow' : 'non-finite-state',
          t,
          `Solver could not converge at t=${t.toPrecision(6)} (step ${h.toExponential(2)}).`
        )
      }
    }
    rows.push([...y])
  }

  return rows
}
