import { useCallback, useEffect, useMemo, useState } from 'react'
import './App.css'
import { useAppContext } from './state/appContext'
import { ParameterControls } from './ui/ParameterControls'
import { SessionDetails } from './ui/SessionDetails'
import { Toolbar } from './ui/Toolbar'
import { PlotlyViewport, type PlotlyPointClick } from './viewports/plotly/PlotlyViewport'
import { resolveClickPoint } from './viewports/plotly/clickSelection'
import { buildPhaseSpaceFigure } from './viewports/plotly/phaseSpaceFigure'
import { isDeterministicMode } from './utils/determinism'

const THEME_STORAGE_KEY = 'phase-explorer-theme'

function App() {
  const { state, actions, config } = useAppContext()
  const { session, payload, error } = state
  const [animated, setAnimated] = useState(false)
  const [theme, setTheme] = useState<'light' | 'dark'>(() => {
    if (typeof window === 'undefined') return 'light'
    if (isDeterministicMode()) return 'light'
    const stored =
      'localStorage' in window && typeof window.localStorage.getItem === 'function'
        ? window.localStorage.getItem(THEME_STORAGE_KEY)
        : null
    return stored === 'dark' ? 'dark' : 'light'
  })

  useEffect(() => {
    document.documentElement.dataset.theme = theme
    if (
      !isDeterministicMode() &&
      'localStorage' in window &&
      typeof window.localStorage.setItem === 'function'
    ) {
      window.localStorage.setItem(THEME_STORAGE_KEY, theme)
    }
  }, [theme])

  const figure = useMemo(
    () =>
      payload
        ? buildPhaseSpaceFigure(payload, {
            variant: animated ? 'animated' : 'static',
            frameCount: config.frameCount,
            theme,
          })
        : null,
    [animated, config.frameCount, payload, theme]
  )

  const handlePointClick = useCallback(
    (point: PlotlyPointClick) => {
      actions.selectPhasePoint(resolveClickPoint(point))
    },
    [actions]
  )

  return (
    <div className="app">
      <Toolbar
        error={error}
        animated={animated}
        onAnimatedChange={setAnimated}
        onReset={actions.resetSession}
        onDismissError={actions.dismissError}
        theme={theme}
        onThemeChange={setTheme}
      />
      <main className="workspace">
        <aside className="workspace__sidebar">
          <ParameterControls parameters={session.parameters} onChange={actions.setParameter} />
          <SessionDetails
            parameters={session.parameters}
            initialCondition={session.initialCondition}
            payload={payload}
          />
        </aside>
        <section className="workspace__viewport">
          {figure ? (
            <PlotlyViewport
              figure={figure}
              testId="phase-space-viewport"
              onPointClick={handlePointClick}
            />
          ) : (
            <div className="workspace__empty">No trajectory computed yet.</div>
          )}
          <p className="workspace__hint">Click anywhere in the plot to start a new trajectory there.</p>
        </section>
      </main>
    </div>
  )
}

export default App
