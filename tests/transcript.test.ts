import { describe, expect, it } from "vitest"
import type { Message } from "../src/archive/messages.js"
import { bubbleText, renderBubble } from "../src/render/bubble.js"
import { computeGeometry } from "../src/render/geometry.js"
import { PLAIN_THEME, type TranscriptTheme } from "../src/render/theme.js"
import {
  composeTranscript,
  displayText,
  formatHeader,
  NAVIGATION_BANNER,
  PINNED_ONLY_BANNER,
  PINNED_PLACEHOLDER,
} from "../src/render/transcript.js"
import { displayWidth } from "../src/text/width.js"
import { TEST_DATE } from "./helpers/archiveFixture.js"

const VIEWER = "a@x.com"
const geometry = computeGeometry(40, 0.5)

const message = (overrides: Partial<Message>): Message => ({
  senderName: "Bob",
  senderId: "b@x.com",
  text: "hi there",
  timestamp: TEST_DATE,
  pinned: false,
  ...overrides,
})

const compose = (messages: Message[], pinnedOnly = false) =>
  composeTranscript(messages, VIEWER, { geometry, pinnedOnly, theme: PLAIN_THEME })

describe("displayText", () => {
  it("substitutes a placeholder only for pinned non-text messages", () => {
    expect(displayText(message({}))).toBe("hi there")
    expect(displayText(message({ text: "" }))).toBeNull()
    expect(displayText(message({ text: "", pinned: true }))).toBe(PINNED_PLACEHOLDER)
  })
})

describe("formatHeader", () => {
  it("left-aligns other senders", () => {
    expect(formatHeader(message({}), false, geometry, PLAIN_THEME)).toBe("Bob • 2024-06-03 14:05")
  })

  it("right-aligns the viewer's own messages under the self label", () => {
    const header = formatHeader(message({ senderId: VIEWER }), true, geometry, PLAIN_THEME)
    expect(header).toBe(`${" ".repeat(18)}You • 2024-06-03 14:05`)
  })

  it("tags pinned messages and keeps unparsed timestamps", () => {
    expect(formatHeader(message({ pinned: true, timestamp: "yesterday" }), false, geometry, PLAIN_THEME)).toBe(
      "[PINNED] Bob • yesterday",
    )
    expect(formatHeader(message({ senderName: null }), false, geometry, PLAIN_THEME)).toBe("Unknown • 2024-06-03 14:05")
  })

  it("aligns coloured headers by visible width", () => {
    const paint = (value: string) => `\u001b[36m${value}\u001b[39m`
    const theme: TranscriptTheme = { ...PLAIN_THEME, ownSender: paint }
    const header = formatHeader(message({ senderId: VIEWER }), true, geometry, theme)
    expect(header).toBe(`${" ".repeat(18)}${paint("You")} • 2024-06-03 14:05`)
    expect(displayWidth(header)).toBe(40)
  })
})

describe("composeTranscript", () => {
  it("lays out a banner then header and bubble per message", () => {
    const other = message({})
    const own = message({ senderId: VIEWER, senderName: "Alice", text: "hello" })
    const document = compose([other, own])
    expect(document).toBe(
      [
        NAVIGATION_BANNER,
        "\nBob • 2024-06-03 14:05",
        bubbleText(renderBubble("hi there", "left", geometry)),
        `\n${" ".repeat(18)}You • 2024-06-03 14:05`,
        bubbleText(renderBubble("hello", "right", geometry)),
      ].join("\n"),
    )
    const lines = document.split("\n")
    expect(lines.slice(0, 6)).toEqual([
      "Navigation:",
      "   /PINNED → search pinned",
      "   q       → quit pager",
      "",
      "",
      "Bob • 2024-06-03 14:05",
    ])
    expect(lines[7]).toBe(`│ hi there${" ".repeat(12)} │`)
    expect(lines[12]).toBe(`${" ".repeat(16)}│ hello${" ".repeat(15)} │`)
  })

  it("drops text-less messages that are not pinned", () => {
    expect(compose([message({ text: "" })])).toBe(NAVIGATION_BANNER)
  })

  it("shows pinned text-less messages with a placeholder", () => {
    const wide = computeGeometry(80, 0.5)
    const document = composeTranscript([message({ text: "", pinned: true })], VIEWER, {
      geometry: wide,
      pinnedOnly: true,
      theme: PLAIN_THEME,
    })
    expect(document.startsWith(PINNED_ONLY_BANNER)).toBe(true)
    expect(document).toContain("\n[PINNED] Bob • 2024-06-03 14:05\n")
    expect(document).toContain(`\n│ ${PINNED_PLACEHOLDER}${" ".repeat(13)} │\n`)
  })

  it("renders only the banner for an empty conversation", () => {
    expect(compose([], true)).toBe(PINNED_ONLY_BANNER)
  })
})
