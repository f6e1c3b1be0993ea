import { beforeEach, describe, expect, it, vi } from 'vitest'
import { enableDeterministicMode } from '../utils/determinism'
import { RecomputeScheduler, type RecomputeTiming } from './recomputeScheduler'

type Batch = { values: number[] }

const mergeBatches = (earlier: Batch, later: Batch): Batch => ({
  values: [...earlier.values, ...later.values],
})

function flushMicrotasks() {
  return Promise.resolve()
}

describe('RecomputeScheduler', () => {
  beforeEach(() => {
    enableDeterministicMode()
  })

  it('coalesces inputs submitted in the same turn into one run', async () => {
    const runner = vi.fn((_batch: Batch) => 'completed' as const)
    const scheduler = new RecomputeScheduler('recompute', mergeBatches, runner)

    scheduler.submit({ values: [1] })
    scheduler.submit({ values: [2] })
    scheduler.submit({ values: [3] })
    expect(runner).not.toHaveBeenCalled()

    await flushMicrotasks()

    expect(runner).toHaveBeenCalledTimes(1)
    expect(runner).toHaveBeenCalledWith({ values: [1, 2, 3] })
  })

  it('runs again for inputs submitted after a flush', async () => {
    const runner = vi.fn((_batch: Batch) => 'completed' as const)
    const scheduler = new RecomputeScheduler('recompute', mergeBatches, runner)

    scheduler.submit({ values: [1] })
    await flushMicrotasks()
    scheduler.submit({ values: [2] })
    await flushMicrotasks()

    expect(runner.mock.calls).toEqual([[{ values: [1] }], [{ values: [2] }]])
  })

  it('flushes synchronously on demand', () => {
    const runner = vi.fn((_batch: Batch) => 'completed' as const)
    const scheduler = new RecomputeScheduler('recompute', mergeBatches, runner)

    scheduler.submit({ values: [4] })
    scheduler.flush()

    expect(runner).toHaveBeenCalledWith({ values: [4] })
  })

  it('drops a cancelled batch', async () => {
    const runner = vi.fn((_batch: Batch) => 'completed' as const)
    const scheduler = new RecomputeScheduler('recompute', mergeBatches, runner)

    scheduler.submit({ values: [1] })
    scheduler.cancel()
    await flushMicrotasks()

    expect(runner).not.toHaveBeenCalled()
  })

  it('reports a timing record per run', async () => {
    const timings: RecomputeTiming[] = []
    const scheduler = new RecomputeScheduler(
      'recompute',
      mergeBatches,
      () => 'failed',
      (timing) => timings.push(timing)
    )

    scheduler.submit({ values: [1] })
    await flushMicrotasks()

    expect(timings).toEqual([
      {
        id: 'recompute_0001',
        label: 'recompute',
        startedAt: 0,
        finishedAt: 1,
        durationMs: 1,
        status: 'failed',
      },
    ])
  })

  it('still reports timing when the runner throws', () => {
    const timings: RecomputeTiming[] = []
    const scheduler = new RecomputeScheduler(
      'recompute',
      mergeBatches,
      () => {
        throw new Error('runner broke')
      },
      (timing) => timings.push(timing)
    )

    scheduler.submit({ values: [1] })
    expect(() => scheduler.flush()).toThrow('runner broke')
    expect(timings).toHaveLength(1)
    expect(timings[0].status).toBe('failed')
  })
})
