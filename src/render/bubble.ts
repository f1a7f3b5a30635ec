import { padEnd } from "../text/width.js"
import { wrapText } from "../text/wrap.js"
import type { TerminalGeometry } from "./geometry.js"

export type BubbleAlignment = "left" | "right"

export interface RenderedBubble {
  readonly alignment: BubbleAlignment
  readonly lines: readonly string[]
}

const GLYPHS = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
} as const

/** Columns a bubble occupies: content, one space of padding per side, two borders. */
const bubbleOuterWidth = (contentWidth: number): number => contentWidth + 4

export const renderBubble = (text: string, alignment: BubbleAlignment, geometry: TerminalGeometry): RenderedBubble => {
  const width = geometry.contentWidth
  const rule = GLYPHS.horizontal.repeat(width + 2)
  const framed = [
    `${GLYPHS.topLeft}${rule}${GLYPHS.topRight}`,
    ...wrapText(text, width).map((line) => `${GLYPHS.vertical} ${padEnd(line, width)} ${GLYPHS.vertical}`),
    `${GLYPHS.bottomLeft}${rule}${GLYPHS.bottomRight}`,
  ]
  if (alignment === "left") return { alignment, lines: framed }
  const indent = " ".repeat(Math.max(0, geometry.terminalWidth - bubbleOuterWidth(width)))
  return { alignment, lines: framed.map((line) => indent + line) }
}

export const bubbleText = (bubble: RenderedBubble): string => bubble.lines.join("\n")
