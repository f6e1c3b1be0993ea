import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App'
import { AppProvider } from './state/appState'
import { LocalSimulationEngine } from './compute/SimulationEngine'
import type { RecomputeTiming } from './compute/recomputeScheduler'
import { isDeterministicFlag, resolveSimulationConfig } from './system/config'
import { enableDeterministicMode } from './utils/determinism'

function logTiming(timing: RecomputeTiming) {
  if (!import.meta.env.DEV) return
  console.info(
    `[Simulation] ${timing.label} ${timing.status} in ${timing.durationMs.toFixed(1)}ms`
  )
}

function bootstrap() {
  const params = new URLSearchParams(window.location.search)
  const deterministic =
    params.has('test') ||
    params.has('deterministic') ||
    isDeterministicFlag(import.meta.env.VITE_DETERMINISTIC_TEST)

  if (deterministic) {
    enableDeterministicMode()
    document.documentElement.dataset.deterministic = '1'
  }

  const config = resolveSimulationConfig(import.meta.env)
  const engine = new LocalSimulationEngine()

  const container = document.getElementById('root')
  if (!container) {
    throw new Error('Missing #root element.')
  }

  createRoot(container).render(
    <StrictMode>
      <AppProvider engine={engine} config={config} onTiming={logTiming}>
        <App />
      </AppProvider>
    </StrictMode>
  )
}

bootstrap()
