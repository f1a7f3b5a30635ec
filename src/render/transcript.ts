import { hasText, isPinned, senderLabel, type Message } from "../archive/messages.js"
import { normalizeTimestamp } from "../archive/timestamps.js"
import { padStart } from "../text/width.js"
import { bubbleText, renderBubble, type BubbleAlignment } from "./bubble.js"
import type { TerminalGeometry } from "./geometry.js"
import { createTheme, type TranscriptTheme } from "./theme.js"

export const SELF_LABEL = "You"
export const PINNED_TAG = "[PINNED] "
export const PINNED_PLACEHOLDER = "[Pinned message (non-text)]"
export const NAVIGATION_BANNER = "Navigation:\n   /PINNED → search pinned\n   q       → quit pager\n"
export const PINNED_ONLY_BANNER = "📌 Showing ONLY pinned messages\n"

export interface ComposeOptions {
  readonly geometry: TerminalGeometry
  readonly pinnedOnly?: boolean
  readonly theme?: TranscriptTheme
}

/** Text shown in the bubble, or null when the message has nothing to show. */
export const displayText = (message: Message): string | null => {
  if (hasText(message)) return message.text
  return isPinned(message) ? PINNED_PLACEHOLDER : null
}

export const formatHeader = (
  message: Message,
  isOwn: boolean,
  geometry: TerminalGeometry,
  theme: TranscriptTheme,
): string => {
  const tag = isPinned(message) ? theme.pinnedTag(PINNED_TAG) : ""
  const sender = isOwn ? theme.ownSender(SELF_LABEL) : theme.otherSender(senderLabel(message))
  const header = `${tag}${sender} • ${theme.timestamp(normalizeTimestamp(message.timestamp))}`
  return isOwn ? padStart(header, geometry.terminalWidth) : header
}

/** Renders messages, in file order, as one pager-ready document. */
export const composeTranscript = (
  messages: readonly Message[],
  viewerIdentity: string,
  options: ComposeOptions,
): string => {
  const theme = options.theme ?? createTheme()
  const output: string[] = [theme.banner(options.pinnedOnly ? PINNED_ONLY_BANNER : NAVIGATION_BANNER)]
  for (const message of messages) {
    const text = displayText(message)
    if (text === null) continue
    const isOwn = message.senderId === viewerIdentity
    const alignment: BubbleAlignment = isOwn ? "right" : "left"
    output.push(`\n${formatHeader(message, isOwn, options.geometry, theme)}`)
    output.push(bubbleText(renderBubble(text, alignment, options.geometry)))
  }
  return output.join("\n")
}
