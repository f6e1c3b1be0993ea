import { describe, expect, it } from 'vitest'
import { resolveClickPoint } from './clickSelection'

describe('resolveClickPoint', () => {
  it('reads data coordinates from a click', () => {
    expect(resolveClickPoint({ curveNumber: 0, pointIndex: 12, x: 20, y: 15 })).toEqual([20, 15])
  })

  it('accepts numeric strings', () => {
    expect(resolveClickPoint({ x: '42.5', y: '7' })).toEqual([42.5, 7])
  })

  it('returns null for clicks without usable coordinates', () => {
    expect(resolveClickPoint(null)).toBeNull()
    expect(resolveClickPoint({ x: 20 })).toBeNull()
    expect(resolveClickPoint({ x: Number.NaN, y: 3 })).toBeNull()
    expect(resolveClickPoint({ x: '', y: 3 })).toBeNull()
    expect(resolveClickPoint({ x: 'left', y: 3 })).toBeNull()
  })
})
