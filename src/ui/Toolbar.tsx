type ToolbarProps = {
  error: string | null
  animated: boolean
  onAnimatedChange: (animated: boolean) => void
  onReset: () => void
  onDismissError: () => void
  theme: 'light' | 'dark'
  onThemeChange: (theme: 'light' | 'dark') => void
}

export function Toolbar({
  error,
  animated,
  onAnimatedChange,
  onReset,
  onDismissError,
  theme,
  onThemeChange,
}: ToolbarProps) {
  const nextTheme = theme === 'light' ? 'dark' : 'light'

  return (
    <header className="toolbar" data-testid="toolbar">
      <div className="toolbar__title">
        <span className="toolbar__logo">Lotka-Volterra</span>
        <span className="toolbar__subtitle">Predator-prey phase space</span>
      </div>
      <div className="toolbar__actions">
        <label className="toolbar__toggle">
          <input
            type="checkbox"
            checked={animated}
            onChange={(event) => onAnimatedChange(event.target.checked)}
            data-testid="toggle-animation"
          />
          Animate
        </label>
        <button onClick={onReset} data-testid="reset-session">
          Reset
        </button>
        <button
          onClick={() => onThemeChange(nextTheme)}
          aria-pressed={theme === 'dark'}
          title={`Switch to ${nextTheme} colors`}
          data-testid="toggle-theme"
        >
          {theme === 'dark' ? 'Light' : 'Dark'}
        </button>
      </div>
      <div className="toolbar__status" data-testid="toolbar-status">
        {error ? (
          <span className="toolbar__error" role="alert">
            {error}
            <button
              className="toolbar__dismiss"
              onClick={onDismissError}
              aria-label="Dismiss error"
            >
              ×
            </button>
          </span>
        ) : (
          <span>Ready</span>
        )}
      </div>
    </header>
  )
}
