import { DEFAULT_SIMULATION_CONFIG } from './defaults'
import type { SimulationConfig } from './types'

type EnvRecord = Record<string, unknown>

function readNumber(env: EnvRecord, key: string): number | null {
  const raw = env[key]
  if (raw === undefined || raw === null) return null
  if (typeof raw === 'number') return raw
  if (typeof raw !== 'string' || raw.trim() === '') return null
  return Number(raw)
}

/**
 * Resolve the static simulation settings from Vite env variables.
 * Missing entries fall back to defaults; malformed ones throw.
 */
export function resolveSimulationConfig(env: EnvRecord): SimulationConfig {
  const tEnd = readNumber(env, 'VITE_SIMULATION_T_END') ?? DEFAULT_SIMULATION_CONFIG.tEnd
  const points = readNumber(env, 'VITE_SIMULATION_POINTS') ?? DEFAULT_SIMULATION_CONFIG.points
  const frameCount =
    readNumber(env, 'VITE_ANIMATION_FRAMES') ?? DEFAULT_SIMULATION_CONFIG.frameCount

  if (!Number.isFinite(tEnd) || tEnd <= 0) {
    throw new Error('VITE_SIMULATION_T_END must be a positive number.')
  }
  if (!Number.isInteger(points) || points < 2) {
    throw new Error('VITE_SIMULATION_POINTS must be an integer of at least 2.')
  }
  if (!Number.isInteger(frameCount) || frameCount < 1) {
    throw new Error('VITE_ANIMATION_FRAMES must be a positive integer.')
  }
  return { tEnd, points, frameCount }
}

export function isDeterministicFlag(value: unknown): boolean {
  return value === '1' || value === 'true' || value === true
}
