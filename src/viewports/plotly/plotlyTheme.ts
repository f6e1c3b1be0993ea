export type PlotlyThemeMode = 'light' | 'dark'

export type PlotlyThemeTokens = {
  background: string
  text: string
  muted: string
  trajectory: string
  marker: string
}

const FALLBACK_TOKENS: Record<PlotlyThemeMode, PlotlyThemeTokens> = {
  dark: {
    background: '#353535',
    text: '#e1e1e1',
    muted: '#b1b1b1',
    trajectory: '#6ea8fe',
    marker: '#ff6b6b',
  },
  light: {
    background: '#ffffff',
    text: '#1a1a1a',
    muted: '#5c5c5c',
    trajectory: '#1f4fd1',
    marker: '#d62728',
  },
}

function readCssVar(name: string): string | null {
  if (typeof window === 'undefined' || typeof getComputedStyle !== 'function') {
    return null
  }
  const value = getComputedStyle(document.documentElement).getPropertyValue(name).trim()
  return value.length > 0 ? value : null
}

function detectTheme(): PlotlyThemeMode | null {
  if (typeof document === 'undefined') return null
  const theme = document.documentElement.dataset.theme
  return theme === 'light' || theme === 'dark' ? theme : null
}

/**
 * Colors for the phase-space figure. CSS variables on the document override the
 * fallbacks when the document is in the requested theme.
 */
export function resolvePlotlyThemeTokens(theme?: PlotlyThemeMode): PlotlyThemeTokens {
  const resolvedTheme = theme ?? detectTheme() ?? 'light'
  const fallback = FALLBACK_TOKENS[resolvedTheme]
  if (detectTheme() !== resolvedTheme) {
    return fallback
  }
  return {
    background: readCssVar('--panel') ?? fallback.background,
    text: readCssVar('--plotly-text') ?? readCssVar('--text') ?? fallback.text,
    muted: readCssVar('--plotly-text-muted') ?? readCssVar('--text-muted') ?? fallback.muted,
    trajectory: readCssVar('--trajectory') ?? fallback.trajectory,
    marker: readCssVar('--initial-marker') ?? fallback.marker,
  }
}
