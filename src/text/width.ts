import stringWidth from "string-width"

/** Terminal columns occupied by `value`. ANSI escapes and zero-width code points count 0. */
export const displayWidth = (value: string): number => stringWidth(value)

export const padEnd = (value: string, width: number): string => {
  const gap = width - displayWidth(value)
  return gap > 0 ? value + " ".repeat(gap) : value
}

export const padStart = (value: string, width: number): string => {
  const gap = width - displayWidth(value)
  return gap > 0 ? " ".repeat(gap) + value : value
}
