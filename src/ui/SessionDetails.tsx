import { useMemo } from 'react'
import { conservedQuantityDrift, findEquilibria, linearizedPeriod } from '../math/analysis'
import type { Eigenvalue, Parameters, RenderPayload, State } from '../system/types'

function formatNumber(value: number, digits = 3): string {
  if (!Number.isFinite(value)) return '—'
  return value.toFixed(digits)
}

function formatState([prey, predator]: State): string {
  return `(${formatNumber(prey, 2)}, ${formatNumber(predator, 2)})`
}

function formatEigenvalue({ re, im }: Eigenvalue): string {
  if (im === 0) return formatNumber(re)
  const sign = im < 0 ? '−' : '+'
  return `${formatNumber(re)} ${sign} ${formatNumber(Math.abs(im))}i`
}

export function SessionDetails({
  parameters,
  initialCondition,
  payload,
}: {
  parameters: Parameters
  initialCondition: State
  payload: RenderPayload | null
}) {
  const equilibria = useMemo(() => findEquilibria(parameters), [parameters])
  const drift = useMemo(
    () => (payload ? conservedQuantityDrift(payload.trajectory, payload.parameters) : Number.NaN),
    [payload]
  )

  return (
    <section className="session-details" data-testid="session-details">
      <h2 className="session-details__title">Session</h2>
      <dl className="session-details__list">
        <dt>Initial condition</dt>
        <dd data-testid="initial-condition">{formatState(initialCondition)}</dd>
        <dt>Linearized period</dt>
        <dd data-testid="linearized-period">{formatNumber(linearizedPeriod(parameters), 2)}</dd>
        <dt>Conserved quantity drift</dt>
        <dd data-testid="conserved-drift">
          {Number.isFinite(drift) ? drift.toExponential(1) : '—'}
        </dd>
      </dl>
      <h3 className="session-details__subtitle">Equilibria</h3>
      <ul className="session-details__equilibria">
        {equilibria.map((equilibrium) => (
          <li key={equilibrium.label} data-testid={`equilibrium-${equilibrium.label}`}>
            <span className="session-details__label">{equilibrium.label}</span>{' '}
            {formatState(equilibrium.state)} · {equilibrium.kind} ·{' '}
            {equilibrium.eigenvalues.map(formatEigenvalue).join(', ')}
          </li>
        ))}
      </ul>
    </section>
  )
}
