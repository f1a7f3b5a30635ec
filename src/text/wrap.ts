import { displayWidth } from "./width.js"

const wrapParagraph = (paragraph: string, maxWidth: number): string[] => {
  const words = paragraph.split(/[ \t\f\v]+/).filter((word) => word.length > 0)
  if (words.length === 0) return [""]
  const lines: string[] = []
  let current = ""
  let currentWidth = 0
  for (const word of words) {
    const wordWidth = displayWidth(word)
    if (currentWidth === 0) {
      current = word
      currentWidth = wordWidth
      continue
    }
    if (currentWidth + 1 + wordWidth <= maxWidth) {
      current += ` ${word}`
      currentWidth += 1 + wordWidth
      continue
    }
    lines.push(current)
    current = word
    currentWidth = wordWidth
  }
  lines.push(current)
  return lines
}

/**
 * Greedy word wrap by display width. Words are never split: a word wider than
 * `width` gets a line of its own and overflows it. Line breaks in `text` start a
 * new paragraph.
 */
export const wrapText = (text: string, width: number): string[] => {
  const maxWidth = Math.max(1, Math.floor(width))
  return text.split(/\r?\n/).flatMap((paragraph) => wrapParagraph(paragraph, maxWidth))
}
