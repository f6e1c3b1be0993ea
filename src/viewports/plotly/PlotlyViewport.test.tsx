import { act, render, waitFor } from '@testing-library/react'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { installPlotlyClickEmitter } from '../../test/plotlyGraphDiv'
import { PlotlyViewport, toPointClick } from './PlotlyViewport'
import { purgePlot, renderPlot } from './plotlyAdapter'
import type { PlotlyFigure } from './plotlyAdapter'

const figure = (x: number[]): PlotlyFigure => ({
  data: [{ type: 'scatter', mode: 'lines', x, y: x }],
  layout: {},
})

describe('toPointClick', () => {
  it('falls back to pointNumber for the point index', () => {
    expect(toPointClick({ points: [{ curveNumber: 0, pointNumber: 7, x: 20, y: 15 }] })).toEqual({
      curveNumber: 0,
      pointIndex: 7,
      x: 20,
      y: 15,
    })
  })

  it('returns null without a clicked point', () => {
    expect(toPointClick({ points: [] })).toBeNull()
    expect(toPointClick(undefined)).toBeNull()
  })
})

describe('PlotlyViewport', () => {
  let emitter: ReturnType<typeof installPlotlyClickEmitter> | null = null

  afterEach(() => {
    emitter?.uninstall()
    emitter = null
  })

  it('reports clicks on the rendered plot', async () => {
    vi.clearAllMocks()
    const clicks = installPlotlyClickEmitter()
    emitter = clicks
    const onPointClick = vi.fn()

    render(<PlotlyViewport figure={figure([0, 1])} onPointClick={onPointClick} />)

    await waitFor(() => {
      expect(clicks.on).toHaveBeenCalledTimes(1)
    })
    act(() => {
      clicks.click({ points: [{ curveNumber: 0, pointNumber: 4242, x: 42.42, y: 42 }] })
    })

    expect(onPointClick).toHaveBeenCalledTimes(1)
    expect(onPointClick).toHaveBeenCalledWith({
      curveNumber: 0,
      pointIndex: 4242,
      x: 42.42,
      y: 42,
    })
  })

  it('ignores click events without points', async () => {
    vi.clearAllMocks()
    const clicks = installPlotlyClickEmitter()
    emitter = clicks
    const onPointClick = vi.fn()

    render(<PlotlyViewport figure={figure([0, 1])} onPointClick={onPointClick} />)

    await waitFor(() => {
      expect(clicks.on).toHaveBeenCalledTimes(1)
    })
    act(() => {
      clicks.click({ points: [] })
    })

    expect(onPointClick).not.toHaveBeenCalled()
  })

  it('keeps a single click listener across re-renders', async () => {
    vi.clearAllMocks()
    const clicks = installPlotlyClickEmitter()
    emitter = clicks
    const onPointClick = vi.fn()

    const { rerender } = render(
      <PlotlyViewport figure={figure([0, 1])} onPointClick={onPointClick} />
    )
    await waitFor(() => {
      expect(clicks.on).toHaveBeenCalledTimes(1)
    })

    rerender(<PlotlyViewport figure={figure([0, 1, 2])} onPointClick={onPointClick} />)
    await waitFor(() => {
      expect(clicks.on).toHaveBeenCalledTimes(2)
    })

    expect(renderPlot).toHaveBeenCalledTimes(2)
    expect(clicks.removeListener).toHaveBeenCalledTimes(1)
    expect(clicks.listenerCount()).toBe(1)

    act(() => {
      clicks.click({ points: [{ pointIndex: 1, x: 5, y: 6 }] })
    })
    expect(onPointClick).toHaveBeenCalledTimes(1)
  })

  it('detaches the listener and purges the plot on unmount', async () => {
    vi.clearAllMocks()
    const clicks = installPlotlyClickEmitter()
    emitter = clicks

    const { unmount } = render(<PlotlyViewport figure={figure([0, 1])} onPointClick={vi.fn()} />)
    await waitFor(() => {
      expect(clicks.on).toHaveBeenCalledTimes(1)
    })

    unmount()

    expect(clicks.listenerCount()).toBe(0)
    expect(purgePlot).toHaveBeenCalledTimes(1)
  })
})
