export type ParameterName = 'alpha' | 'beta' | 'gamma' | 'delta'

export type Parameters = Readonly<Record<ParameterName, number>>

/** Phase-space point: prey population, then predator population. */
export type State = readonly [prey: number, predator: number]

export type TimeGrid = readonly number[]

export type Trajectory = readonly State[]

export type ParameterControl = {
  name: ParameterName
  symbol: string
  label: string
  min: number
  max: number
  step: number
}

export type AxisRange = readonly [min: number, max: number]

export type DisplayBounds = {
  prey: AxisRange
  predator: AxisRange
}

export type DisplayVariant = 'static' | 'animated'

export type SimulationConfig = {
  tEnd: number
  points: number
  frameCount: number
}

export type SessionState = {
  parameters: Parameters
  initialCondition: State
}

export type RenderPayload = {
  trajectory: Trajectory
  initialCondition: State
  parameters: Parameters
  timeGrid: TimeGrid
}

export type Eigenvalue = { re: number; im: number }

export type EquilibriumKind = 'saddle' | 'center' | 'node' | 'focus'

export type Equilibrium = {
  label: 'extinction' | 'coexistence'
  state: State
  eigenvalues: [Eigenvalue, Eigenvalue]
  kind: EquilibriumKind
}
