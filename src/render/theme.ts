import chalk, { Chalk, type ChalkInstance } from "chalk"

export type ColorMode = "auto" | "none"

export interface TranscriptTheme {
  readonly ownSender: (value: string) => string
  readonly otherSender: (value: string) => string
  readonly pinnedTag: (value: string) => string
  readonly timestamp: (value: string) => string
  readonly banner: (value: string) => string
}

export const resolveColorMode = (env: NodeJS.ProcessEnv = process.env): ColorMode => {
  if (env.NO_COLOR != null && env.NO_COLOR !== "") return "none"
  return env.CHATVIEW_COLOR?.trim().toLowerCase() === "none" ? "none" : "auto"
}

const themeFrom = (painter: ChalkInstance): TranscriptTheme => ({
  ownSender: (value) => painter.cyan.bold(value),
  otherSender: (value) => painter.green.bold(value),
  pinnedTag: (value) => painter.yellow(value),
  timestamp: (value) => painter.dim(value),
  banner: (value) => painter.gray(value),
})

export const PLAIN_THEME = themeFrom(new Chalk({ level: 0 }))

export const createTheme = (mode: ColorMode = resolveColorMode()): TranscriptTheme =>
  mode === "none" ? PLAIN_THEME : themeFrom(chalk)
