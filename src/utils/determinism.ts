type DeterministicOptions = {
  perfStepMs?: number
}

const DEFAULT_PERF_STEP_MS = 1

type DeterministicState = {
  enabled: boolean
  perfMs: number
  perfStepMs: number
  idCounters: Map<string, number>
}

const state: DeterministicState = {
  enabled: false,
  perfMs: 0,
  perfStepMs: DEFAULT_PERF_STEP_MS,
  idCounters: new Map(),
}

/**
 * Enable deterministic mode for tests and external harnesses.
 * Recompute ids and timings become repeatable.
 */
export function enableDeterministicMode(options?: DeterministicOptions) {
  state.enabled = true
  state.perfMs = 0
  state.perfStepMs = options?.perfStepMs ?? DEFAULT_PERF_STEP_MS
  state.idCounters.clear()
}

export function isDeterministicMode() {
  return state.enabled
}

function randomSuffix(): string {
  if (typeof crypto !== 'undefined' && 'randomUUID' in crypto) {
    return crypto.randomUUID()
  }
  return Math.random().toString(36).slice(2, 10)
}

export function makeStableId(prefix: string) {
  if (!state.enabled) return `${prefix}_${randomSuffix()}`
  const next = (state.idCounters.get(prefix) ?? 0) + 1
  state.idCounters.set(prefix, next)
  return `${prefix}_${String(next).padStart(4, '0')}`
}

/**
 * Monotonic clock for recompute timings; steps by a fixed amount per read in
 * deterministic mode.
 */
export function nowPerfMs(): number {
  if (!state.enabled) {
    if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
      return performance.now()
    }
    return Date.now()
  }
  const value = state.perfMs
  state.perfMs += state.perfStepMs
  return value
}
