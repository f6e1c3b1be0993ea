import { describe, expect, it } from 'vitest'
import { isDeterministicFlag, resolveSimulationConfig } from './config'

describe('resolveSimulationConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveSimulationConfig({})).toEqual({ tEnd: 100, points: 1000, frameCount: 100 })
  })

  it('treats blank values as unset', () => {
    expect(resolveSimulationConfig({ VITE_SIMULATION_POINTS: '  ' }).points).toBe(1000)
  })

  it('reads overrides from the environment', () => {
    expect(
      resolveSimulationConfig({
        VITE_SIMULATION_T_END: '50',
        VITE_SIMULATION_POINTS: '500',
        VITE_ANIMATION_FRAMES: '25',
      })
    ).toEqual({ tEnd: 50, points: 500, frameCount: 25 })
  })

  it('throws on malformed values', () => {
    expect(() => resolveSimulationConfig({ VITE_SIMULATION_T_END: 'soon' })).toThrow(
      'VITE_SIMULATION_T_END must be a positive number.'
    )
    expect(() => resolveSimulationConfig({ VITE_SIMULATION_POINTS: '1' })).toThrow(
      'VITE_SIMULATION_POINTS must be an integer of at least 2.'
    )
    expect(() => resolveSimulationConfig({ VITE_ANIMATION_FRAMES: '0.5' })).toThrow(
      'VITE_ANIMATION_FRAMES must be a positive integer.'
    )
  })
})

describe('isDeterministicFlag', () => {
  it('accepts 1 and true', () => {
    expect(isDeterministicFlag('1')).toBe(true)
    expect(isDeterministicFlag('true')).toBe(true)
    expect(isDeterministicFlag(undefined)).toBe(false)
    expect(isDeterministicFlag('0')).toBe(false)
  })
})
