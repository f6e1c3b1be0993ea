import { makeStableId, nowPerfMs } from '../utils/determinism'

export type RecomputeTiming = {
  id: string
  label: string
  startedAt: number
  finishedAt: number
  durationMs: number
  status: 'completed' | 'failed'
}

type RecomputeRunner<I> = (inputs: I) => RecomputeTiming['status']

type MergeInputs<I> = (earlier: I, later: I) => I

/**
 * Coalesces inputs submitted within the same turn of the event loop into a
 * single synchronous recompute. Nothing is queued: the pending batch is merged
 * in place and flushed once on the next microtask.
 */
export class RecomputeScheduler<I> {
  private label: string
  private merge: MergeInputs<I>
  private runner: RecomputeRunner<I>
  private onTiming?: (timing: RecomputeTiming) => void
  private pending: { inputs: I } | null = null
  private scheduled = false

  constructor(
    label: string,
    merge: MergeInputs<I>,
    runner: RecomputeRunner<I>,
    onTiming?: (timing: RecomputeTiming) => void
  ) {
    this.label = label
    this.merge = merge
    this.runner = runner
    this.onTiming = onTiming
  }

  submit(inputs: I) {
    this.pending = this.pending
      ? { inputs: this.merge(this.pending.inputs, inputs) }
      : { inputs }
    this.scheduleFlush()
  }

  /** Run the pending batch now, if any. */
  flush() {
    const batch = this.pending
    if (!batch) return
    this.pending = null

    const id = makeStableId('recompute')
    const startedAt = nowPerfMs()
    let status: RecomputeTiming['status'] = 'failed'
    try {
      status = this.runner(batch.inputs)
    } finally {
      this.emitTiming(id, startedAt, nowPerfMs(), status)
    }
  }

  cancel() {
    this.pending = null
  }

  private scheduleFlush() {
    if (this.scheduled) return
    this.scheduled = true
    const run = () => {
      this.scheduled = false
      this.flush()
    }
    if (typeof queueMicrotask === 'function') {
      queueMicrotask(run)
    } else {
      setTimeout(run, 0)
    }
  }

  private emitTiming(
    id: string,
    startedAt: number,
    finishedAt: number,
    status: RecomputeTiming['status']
  ) {
    if (!this.onTiming) return
    this.onTiming({
      id,
      label: this.label,
      startedAt,
      finishedAt,
      durationMs: Math.max(0, finishedAt - startedAt),
      status,
    })
  }
}
