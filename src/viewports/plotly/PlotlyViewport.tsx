import { useEffect, useRef, useState } from 'react'
import { isPlotlyLoaded, preloadPlotly, purgePlot, renderPlot, resizePlot, type PlotlyFigure } from './plotlyAdapter'

export type PlotlyPointClick = {
  curveNumber?: number
  pointIndex?: number
  x?: unknown
  y?: unknown
}

type PlotlyClickEvent = {
  points?: Array<PlotlyPointClick & { pointNumber?: number }>
}

type ClickListener = (event: PlotlyClickEvent) => void

// Plotly attaches an event emitter to the graph div once it has rendered.
type PlotlyGraphDiv = HTMLDivElement & {
  on?: (event: 'plotly_click', listener: ClickListener) => void
  removeListener?: (event: 'plotly_click', listener: ClickListener) => void
}

/** First clicked point; scatter traces report the index as `pointNumber`. */
export function toPointClick(event: PlotlyClickEvent | undefined): PlotlyPointClick | null {
  const point = event?.points?.[0]
  if (!point) return null
  return {
    curveNumber: point.curveNumber,
    pointIndex: point.pointIndex ?? point.pointNumber,
    x: point.x,
    y: point.y,
  }
}

function listenForClicks(node: PlotlyGraphDiv, listener: ClickListener): (() => void) | null {
  if (!node.on) return null
  node.on('plotly_click', listener)
  return () => {
    node.removeListener?.('plotly_click', listener)
  }
}

export function PlotlyViewport({
  figure,
  testId = 'plotly-viewport',
  onPointClick,
}: {
  figure: PlotlyFigure
  testId?: string
  onPointClick?: (point: PlotlyPointClick) => void
}) {
  const containerRef = useRef<HTMLDivElement | null>(null)
  const [loading, setLoading] = useState(!isPlotlyLoaded())
  const [error, setError] = useState<string | null>(null)
  const onPointClickRef = useRef(onPointClick)
  const detachClickRef = useRef<(() => void) | null>(null)

  useEffect(() => {
    onPointClickRef.current = onPointClick
  }, [onPointClick])

  useEffect(() => {
    preloadPlotly()
  }, [])

  useEffect(() => {
    const node = containerRef.current
    if (!node) return
    const controller = new AbortController()
    const runRender = async () => {
      if (controller.signal.aborted) return
      setError(null)
      setLoading(!isPlotlyLoaded())
      try {
        await renderPlot(node, figure, { signal: controller.signal })
        if (controller.signal.aborted) return
        setLoading(false)
        // Plotly.react keeps listeners on the div, so swap rather than stack them.
        detachClickRef.current?.()
        detachClickRef.current = listenForClicks(node, (event) => {
          const click = toPointClick(event)
          if (click) onPointClickRef.current?.(click)
        })
      } catch (err) {
        if (controller.signal.aborted) return
        const message = err instanceof Error ? err.message : String(err)
        setError(message)
        setLoading(false)
      }
    }
    void runRender()
    return () => {
      controller.abort()
    }
  }, [figure])

  useEffect(() => {
    const node = containerRef.current
    if (!node || typeof ResizeObserver === 'undefined') return
    let frame = 0
    const observer = new ResizeObserver(() => {
      if (frame) cancelAnimationFrame(frame)
      frame = requestAnimationFrame(() => {
        void resizePlot(node)
      })
    })
    observer.observe(node)
    return () => {
      if (frame) cancelAnimationFrame(frame)
      observer.disconnect()
    }
  }, [])

  useEffect(() => {
    const node = containerRef.current
    if (!node) return
    return () => {
      detachClickRef.current?.()
      detachClickRef.current = null
      purgePlot(node)
    }
  }, [])

  return (
    <div className="plotly-viewport plotly-viewport--container">
      <div
        className="plotly-viewport__canvas"
        ref={containerRef}
        data-testid={testId}
        data-trace-count={figure.data.length}
        data-frame-count={figure.frames?.length ?? 0}
      />
      {loading ? <div className="plotly-viewport__overlay">Loading viewport…</div> : null}
      {error ? <div className="plotly-viewport__overlay is-error">{error}</div> : null}
    </div>
  )
}
