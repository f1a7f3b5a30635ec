export const DEFAULT_TERMINAL_WIDTH = 80
export const DEFAULT_BUBBLE_WIDTH_RATIO = 0.55

export interface TerminalGeometry {
  readonly terminalWidth: number
  /** Wrapped text width inside a bubble, excluding borders and inner padding. */
  readonly contentWidth: number
}

export const computeGeometry = (terminalWidth: number, ratio: number = DEFAULT_BUBBLE_WIDTH_RATIO): TerminalGeometry => {
  const width = Math.max(1, Math.floor(terminalWidth))
  return { terminalWidth: width, contentWidth: Math.max(1, Math.floor(width * ratio)) }
}

interface ColumnsSource {
  readonly columns?: number
}

export const resolveTerminalWidth = (stream: ColumnsSource, env: NodeJS.ProcessEnv = process.env): number => {
  if (stream.columns && stream.columns > 0) return stream.columns
  const fromEnv = Number.parseInt(env.COLUMNS ?? "", 10)
  return Number.isFinite(fromEnv) && fromEnv > 0 ? fromEnv : DEFAULT_TERMINAL_WIDTH
}
