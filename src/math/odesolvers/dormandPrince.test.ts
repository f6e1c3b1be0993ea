import { describe, expect, it } from 'vitest'
import { DEFAULT_INITIAL_CONDITION, DEFAULT_PARAMETERS } from '../../system/defaults'
import { createTimeGrid } from '../../system/timeGrid'
import { conservedQuantity } from '../analysis'
import { lotkaVolterra, type VectorField } from '../vectorField'
import { IntegrationFailure, integrate } from './dormandPrince'

const decay: VectorField<{ rate: number }> = ([y], _t, { rate }) => [-rate * y]
const blowUp: VectorField<null> = ([y]) => [y * y]

describe('integrate', () => {
  it('reproduces the seed exactly and samples every grid point', () => {
    const grid = createTimeGrid(100, 1000)
    const rows = integrate(lotkaVolterra, [20, 15], grid, DEFAULT_PARAMETERS)

    expect(rows).toHaveLength(grid.length)
    expect(rows[0]).toEqual([20, 15])
  })

  it('copies the seed rather than aliasing it', () => {
    const seed = [3, 4]
    const rows = integrate(lotkaVolterra, seed, [0, 1], DEFAULT_PARAMETERS)
    rows[0][0] = 99
    expect(seed).toEqual([3, 4])
  })

  it('matches the exact solution of a linear decay on the grid', () => {
    const grid = [0, 0.5, 1, 2, 5]
    const rows = integrate(decay, [1], grid, { rate: 0.7 })
    rows.forEach(([value], index) => {
      expect(value).toBeCloseTo(Math.exp(-0.7 * grid[index]), 7)
    })
  })

  it('is deterministic for identical inputs', () => {
    const grid = createTimeGrid(100, 1000)
    const first = integrate(lotkaVolterra, [10, 5], grid, DEFAULT_PARAMETERS)
    const second = integrate(lotkaVolterra, [10, 5], grid, DEFAULT_PARAMETERS)
    expect(second).toEqual(first)
  })

  it('stays on the coexistence fixed point', () => {
    const parameters = { alpha: 1, beta: 0.1, gamma: 1, delta: 0.1 }
    const fixedPoint = [parameters.gamma / parameters.delta, parameters.alpha / parameters.beta]
    const rows = integrate(lotkaVolterra, fixedPoint, createTimeGrid(100, 1000), parameters)

    for (const [prey, predator] of rows) {
      expect(prey).toBeCloseTo(10, 9)
      expect(predator).toBeCloseTo(10, 9)
    }
  })

  it('produces a closed orbit from the default scenario', () => {
    const grid = createTimeGrid(100, 1000)
    const rows = integrate(lotkaVolterra, DEFAULT_INITIAL_CONDITION, grid, DEFAULT_PARAMETERS)
    const [prey0, predator0] = DEFAULT_INITIAL_CONDITION
    const reference = conservedQuantity(DEFAULT_INITIAL_CONDITION, DEFAULT_PARAMETERS)

    let closestReturn = Number.POSITIVE_INFINITY
    rows.forEach(([prey, predator], index) => {
      expect(prey).toBeGreaterThan(0)
      expect(predator).toBeGreaterThan(0)
      expect(conservedQuantity([prey, predator], DEFAULT_PARAMETERS)).toBeCloseTo(reference, 2)
      // Skip the first stretch of the first cycle.
      if (grid[index] > 2) {
        closestReturn = Math.min(closestReturn, Math.hypot(prey - prey0, predator - predator0))
      }
    })
    expect(closestReturn).toBeLessThan(1)
  })

  it('reports a finite-time blow-up as an integration failure', () => {
    expect(() => integrate(blowUp, [1], [0, 0.5, 2], null)).toThrow(IntegrationFailure)
  })

  it('rejects a non-finite seed', () => {
    let failure: unknown = null
    try {
      integrate(lotkaVolterra, [Number.NaN, 1], [0, 1], DEFAULT_PARAMETERS)
    } catch (err) {
      failure = err
    }
    expect(failure).toBeInstanceOf(IntegrationFailure)
    expect(failure).toMatchObject({ reason: 'non-finite-state', t: 0 })
  })

  it('stops after the configured step budget', () => {
    expect(() =>
      integrate(decay, [1], [0, 10], { rate: 1 }, { maxStep: 0.1, maxSteps: 20 })
    ).toThrow(/exceeded 20 steps/)
  })

  it('rejects time grids that do not increase', () => {
    expect(() => integrate(decay, [1], [0, 1, 1], { rate: 1 })).toThrow(
      'Time grid must be strictly increasing.'
    )
    expect(() => integrate(decay, [1], [], { rate: 1 })).toThrow(
      'Time grid must contain at least one point.'
    )
  })

  it('returns only the seed for a single-point grid', () => {
    expect(integrate(decay, [2], [0], { rate: 1 })).toEqual([[2]])
  })
})
