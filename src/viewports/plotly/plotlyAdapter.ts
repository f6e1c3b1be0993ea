import type { Config, Data, Layout } from 'plotly.js'

export type PlotlyFrame = {
  name: string
  data: Data[]
  traces: number[]
}

export type PlotlyFigure = {
  data: Data[]
  layout: Partial<Layout>
  frames?: PlotlyFrame[]
}

type MaybePromise<T> = T | Promise<T>

type PlotlyModule = {
  react: (container: HTMLElement, figure: PlotlyFigure & { config: Partial<Config> }) => Promise<unknown>
  purge: (container: HTMLElement) => void
  Plots?: {
    resize: (container: HTMLElement) => MaybePromise<void>
  }
}

const PLOT_CONFIG: Partial<Config> = {
  displaylogo: false,
  displayModeBar: true,
  responsive: true,
  scrollZoom: false,
  doubleClick: false,
}

let plotlyModule: PlotlyModule | null = null
let plotlyPromise: Promise<PlotlyModule> | null = null

function unwrapPlotly(mod: unknown): PlotlyModule {
  const candidate = (mod as { default?: PlotlyModule }).default ?? mod
  return candidate as PlotlyModule
}

async function loadPlotly(): Promise<PlotlyModule> {
  if (plotlyModule) return plotlyModule
  if (!plotlyPromise) {
    plotlyPromise = import('plotly.js-dist-min').then((mod) => {
      plotlyModule = unwrapPlotly(mod)
      return plotlyModule
    })
  }
  return plotlyPromise
}

export function preloadPlotly() {
  void loadPlotly()
}

export function isPlotlyLoaded() {
  return Boolean(plotlyModule)
}

/**
 * Render or update a figure in place. Frames are replaced together with the
 * data so playback always follows the latest trajectory.
 */
export async function renderPlot(
  container: HTMLElement,
  figure: PlotlyFigure,
  opts?: { signal?: AbortSignal }
) {
  const Plotly = await loadPlotly()
  if (opts?.signal?.aborted) return
  await Plotly.react(container, {
    data: figure.data,
    layout: figure.layout,
    frames: figure.frames ?? [],
    config: PLOT_CONFIG,
  })
}

export async function resizePlot(container: HTMLElement) {
  const Plotly = await loadPlotly()
  if (Plotly.Plots?.resize) {
    await Plotly.Plots.resize(container)
  }
}

export function purgePlot(container: HTMLElement) {
  if (!plotlyModule) return
  plotlyModule.purge(container)
}
