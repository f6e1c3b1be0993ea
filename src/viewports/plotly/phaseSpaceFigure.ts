import type { Data, Layout } from 'plotly.js'
import { coexistenceEquilibrium } from '../../math/analysis'
import { DISPLAY_BOUNDS, SELECTION_GRID_SIZE } from '../../system/defaults'
import type { AxisRange, DisplayBounds, DisplayVariant, RenderPayload } from '../../system/types'
import type { PlotlyFigure, PlotlyFrame } from './plotlyAdapter'
import { resolvePlotlyThemeTokens, type PlotlyThemeMode } from './plotlyTheme'

export type PhaseSpaceFigureOptions = {
  variant: DisplayVariant
  frameCount: number
  theme?: PlotlyThemeMode
  selectionGridSize?: number
  frameDurationMs?: number
}

export const TRACE_INDEX = {
  selectionGrid: 0,
  trajectory: 1,
  equilibrium: 2,
  initialCondition: 3,
  reveal: 4,
} as const

const DEFAULT_FRAME_DURATION_MS = 50

function linspace([min, max]: AxisRange, count: number): number[] {
  if (count <= 1) return [min]
  const last = count - 1
  return Array.from({ length: count }, (_, index) =>
    index === last ? max : min + ((max - min) * index) / last
  )
}

/**
 * Invisible click targets covering the whole display area, so a click anywhere
 * in the plot yields data coordinates. Row-major, prey varying fastest.
 */
export function buildSelectionGrid(
  bounds: DisplayBounds,
  size: number
): { x: number[]; y: number[] } {
  const xs = linspace(bounds.prey, size)
  const ys = linspace(bounds.predator, size)
  const x: number[] = []
  const y: number[] = []
  for (const predator of ys) {
    for (const prey of xs) {
      x.push(prey)
      y.push(predator)
    }
  }
  return { x, y }
}

/** Exclusive slice ends for each playback frame; the last frame shows every point. */
export function revealFrameEnds(length: number, frameCount: number): number[] {
  if (length <= 1) return [length]
  const count = Math.max(1, Math.min(Math.floor(frameCount), length - 1))
  return Array.from(
    { length: count },
    (_, index) => 1 + Math.round(((index + 1) * (length - 1)) / count)
  )
}

function buildFrames(prey: number[], predator: number[], frameCount: number): PlotlyFrame[] {
  return revealFrameEnds(prey.length, frameCount).map((end, index) => ({
    name: `frame-${index + 1}`,
    data: [{ x: prey.slice(0, end), y: predator.slice(0, end) }],
    traces: [TRACE_INDEX.reveal],
  }))
}

function playbackMenu(frameDurationMs: number): Partial<Layout>['updatemenus'] {
  return [
    {
      type: 'buttons',
      direction: 'left',
      showactive: false,
      x: 0,
      xanchor: 'left',
      y: 1.12,
      yanchor: 'top',
      buttons: [
        {
          label: 'Play',
          method: 'animate',
          args: [
            null,
            {
              frame: { duration: frameDurationMs, redraw: false },
              transition: { duration: 0 },
              fromcurrent: true,
              mode: 'immediate',
            },
          ],
        },
        {
          label: 'Pause',
          method: 'animate',
          args: [
            [null],
            {
              frame: { duration: 0, redraw: false },
              transition: { duration: 0 },
              mode: 'immediate',
            },
          ],
        },
      ],
    },
  ]
}

/**
 * Presentation primitives for one render: the trajectory path, its start
 * marker and the coexistence point inside fixed axes, plus playback frames in
 * the animated variant. Frames only ever touch the reveal trace.
 */
export function buildPhaseSpaceFigure(
  payload: RenderPayload,
  options: PhaseSpaceFigureOptions
): PlotlyFigure {
  const bounds = DISPLAY_BOUNDS[options.variant]
  const tokens = resolvePlotlyThemeTokens(options.theme)
  const animated = options.variant === 'animated'
  const prey = payload.trajectory.map(([x]) => x)
  const predator = payload.trajectory.map(([, y]) => y)
  const [startPrey, startPredator] = payload.initialCondition
  const [equilibriumPrey, equilibriumPredator] = coexistenceEquilibrium(payload.parameters)
  const grid = buildSelectionGrid(bounds, options.selectionGridSize ?? SELECTION_GRID_SIZE)

  const data: Data[] = [
    {
      type: 'scatter',
      mode: 'markers',
      name: 'Selection grid',
      x: grid.x,
      y: grid.y,
      marker: { color: 'rgba(0,0,0,0)', size: 1 },
      hoverinfo: 'none',
      showlegend: false,
    },
    {
      type: 'scatter',
      mode: 'lines',
      name: 'Trajectory',
      x: prey,
      y: predator,
      line: { color: tokens.trajectory, width: 2 },
      opacity: animated ? 0.35 : 1,
    },
    {
      type: 'scatter',
      mode: 'markers',
      name: 'Coexistence equilibrium',
      x: [equilibriumPrey],
      y: [equilibriumPredator],
      marker: { color: tokens.muted, size: 9, symbol: 'x' },
    },
    {
      type: 'scatter',
      mode: 'markers',
      name: 'Initial Condition',
      x: [startPrey],
      y: [startPredator],
      marker: { color: tokens.marker, size: 10 },
    },
  ]
  if (animated) {
    data.push({
      type: 'scatter',
      mode: 'lines',
      name: 'Playback',
      x: [startPrey],
      y: [startPredator],
      line: { color: tokens.trajectory, width: 3 },
    })
  }

  const layout: Partial<Layout> = {
    title: { text: 'Lotka-Volterra Phase Space' },
    xaxis: {
      title: { text: 'Prey Population' },
      range: [...bounds.prey],
      autorange: false,
    },
    yaxis: {
      title: { text: 'Predator Population' },
      range: [...bounds.predator],
      autorange: false,
    },
    showlegend: true,
    hovermode: 'closest',
    uirevision: `phase-space-${options.variant}`,
    paper_bgcolor: tokens.background,
    plot_bgcolor: tokens.background,
    font: { color: tokens.text },
    margin: { l: 60, r: 20, t: animated ? 80 : 50, b: 50 },
  }
  if (animated) {
    layout.updatemenus = playbackMenu(options.frameDurationMs ?? DEFAULT_FRAME_DURATION_MS)
  }

  return {
    data,
    layout,
    frames: animated ? buildFrames(prey, predator, options.frameCount) : [],
  }
}
