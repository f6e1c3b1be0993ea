import { PARAMETER_CONTROLS } from '../system/defaults'
import { clampParameter } from '../system/parameters'
import type { ParameterName, Parameters } from '../system/types'

function formatValue(value: number, step: number) {
  const decimals = Math.max(0, -Math.floor(Math.log10(step)))
  // Defaults may sit between steps (delta = 0.075), so keep one extra digit.
  return value.toFixed(decimals + 1)
}

export function ParameterControls({
  parameters,
  onChange,
}: {
  parameters: Parameters
  onChange: (name: ParameterName, value: number) => void
}) {
  return (
    <section className="parameter-controls" data-testid="parameter-controls">
      <h2 className="parameter-controls__title">Parameters</h2>
      {PARAMETER_CONTROLS.map((control) => {
        const id = `parameter-${control.name}`
        const value = parameters[control.name]
        // The slider thumb can only sit on a step; the session keeps the exact value.
        const offStep = clampParameter(control.name, value) !== value
        return (
          <div className="parameter-controls__row" key={control.name}>
            <label htmlFor={id}>
              {control.symbol} ({control.label})
            </label>
            <input
              id={id}
              type="range"
              min={control.min}
              max={control.max}
              step={control.step}
              value={value}
              onChange={(event) => onChange(control.name, Number(event.target.value))}
              data-testid={id}
            />
            <output htmlFor={id} data-testid={`${id}-value`}>
              {formatValue(value, control.step)}
            </output>
            {offStep ? (
              <small className="parameter-controls__note" data-testid={`${id}-note`}>
                Between steps; moving the slider snaps to {control.step}.
              </small>
            ) : null}
          </div>
        )
      })}
    </section>
  )
}
