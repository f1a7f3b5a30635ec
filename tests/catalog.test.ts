import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mkdirSync, writeFileSync } from "node:fs"
import path from "node:path"
import {
  buildCatalog,
  classifyFolder,
  formatCatalogEntry,
  labelText,
  parseCatalogSelection,
  resolveDmParticipant,
  type Conversation,
} from "../src/archive/catalog.js"
import { normalizeMessage } from "../src/archive/messages.js"
import { makeTempDir, rawMessage, removeDir, writeConversation } from "./helpers/archiveFixture.js"

const VIEWER = "a@x.com"

let root: string

beforeEach(() => {
  root = makeTempDir("chatview-catalog-")
})

afterEach(() => {
  removeDir(root)
})

const mine = (text: string, pinned = false) => rawMessage({ email: VIEWER, name: "Alice", text, pinned })
const bobs = (text: string, pinned = false) => rawMessage({ email: "b@x.com", name: "Bob", text, pinned })

describe("classifyFolder", () => {
  it("uses the folder name prefix", () => {
    expect(classifyFolder("DM_abc")).toBe("dm")
    expect(classifyFolder("Space_abc")).toBe("group")
    expect(classifyFolder("Users")).toBeNull()
  })
})

describe("resolveDmParticipant", () => {
  it("skips the viewer and unnamed senders", () => {
    const messages = [
      mine("hi"),
      rawMessage({ email: "c@x.com", name: "Unknown", text: "?" }),
      rawMessage({ email: "d@x.com", text: "?" }),
      rawMessage({ email: "e@x.com", name: "Carol", text: "hello" }),
    ].map(normalizeMessage)
    expect(resolveDmParticipant(messages, VIEWER)).toEqual({ kind: "participant", name: "Carol" })
  })

  it("falls back to the deleted user sentinel", () => {
    expect(resolveDmParticipant([normalizeMessage(mine("only me"))], VIEWER)).toEqual({ kind: "deleted-user" })
  })
})

describe("buildCatalog", () => {
  it("labels a DM with the counterpart's name", () => {
    writeConversation(root, "DM_1", { messages: [mine("hi"), bobs("hey")] })
    const catalog = buildCatalog(root, VIEWER, "dm")
    expect(catalog).toEqual([
      { folderId: "DM_1", kind: "dm", label: { kind: "participant", name: "Bob" }, pinnedCount: 0 },
    ])
    expect(labelText(catalog[0])).toBe("Bob")
  })

  it("labels a DM without counterpart messages as Deleted User", () => {
    writeConversation(root, "DM_1", { messages: [] })
    expect(buildCatalog(root, VIEWER, "dm").map(labelText)).toEqual(["Deleted User"])
  })

  it("uses group titles and falls back to the folder id", () => {
    writeConversation(root, "Space_1", [bobs("x")], { name: "Team Room" })
    writeConversation(root, "Space_2", [bobs("x")])
    const brokenPath = writeConversation(root, "Space_3", [bobs("x")])
    writeFileSync(path.join(brokenPath, "group_info.json"), "{", "utf8")
    writeConversation(root, "Space_4", [bobs("x")], { name: "" })
    const catalog = buildCatalog(root, VIEWER, "group")
    expect(catalog.map((entry) => entry.label)).toEqual([
      { kind: "title", title: "Team Room" },
      { kind: "folder", folderId: "Space_2" },
      { kind: "folder", folderId: "Space_3" },
      { kind: "folder", folderId: "Space_4" },
    ])
  })

  it("keeps lexical order and skips unrelated folders", () => {
    writeConversation(root, "DM_b", [bobs("x")])
    writeConversation(root, "DM_a", [bobs("x")])
    writeConversation(root, "Users", [bobs("x")])
    mkdirSync(path.join(root, "DM_empty_folder"))
    writeFileSync(path.join(root, "DM_file.json"), "[]", "utf8")
    expect(buildCatalog(root, VIEWER, "dm").map((entry) => entry.folderId)).toEqual(["DM_a", "DM_b"])
  })

  it("filters by kind", () => {
    writeConversation(root, "DM_1", [bobs("x")])
    writeConversation(root, "Space_1", [bobs("x")], { name: "Team" })
    expect(buildCatalog(root, VIEWER, "dm").map((entry) => entry.folderId)).toEqual(["DM_1"])
    expect(buildCatalog(root, VIEWER, "group").map((entry) => entry.folderId)).toEqual(["Space_1"])
  })

  it("keeps only conversations with pinned messages in the pinned view", () => {
    writeConversation(root, "DM_1", [mine("hi"), bobs("hey")])
    writeConversation(root, "Space_2", [bobs("one", true), mine("two", true), bobs("three")])
    const catalog = buildCatalog(root, VIEWER, "pinned")
    expect(catalog.map((entry) => [entry.folderId, entry.pinnedCount])).toEqual([["Space_2", 2]])
    expect(labelText(catalog[0])).toBe("Space_2 (📌 2)")
  })

  it("counts pinned messages in every view", () => {
    writeConversation(root, "DM_1", [bobs("hey", true)])
    expect(buildCatalog(root, VIEWER, "dm").map(labelText)).toEqual(["Bob (📌 1)"])
  })

  it("returns an empty catalog for a missing root", () => {
    expect(buildCatalog(path.join(root, "missing"), VIEWER, "pinned")).toEqual([])
  })
})

describe("formatCatalogEntry", () => {
  const dm: Conversation = { folderId: "DM_1", kind: "dm", label: { kind: "participant", name: "Bob" }, pinnedCount: 0 }

  it("pads the label column to 45 columns", () => {
    expect(formatCatalogEntry(dm)).toBe(`DM  Bob${" ".repeat(42)} | DM_1`)
    expect(
      formatCatalogEntry({ folderId: "Space_9", kind: "group", label: { kind: "title", title: "Team" }, pinnedCount: 0 }),
    ).toBe(`SP  Team${" ".repeat(41)} | Space_9`)
  })

  it("measures the pin annotation by display width", () => {
    expect(formatCatalogEntry({ ...dm, pinnedCount: 1 })).toBe(`DM  Bob (📌 1)${" ".repeat(35)} | DM_1`)
  })

  it("round-trips through selection parsing", () => {
    expect(parseCatalogSelection(formatCatalogEntry(dm))).toBe("DM_1")
    expect(parseCatalogSelection("SP  A | B | Space_x  ")).toBe("Space_x")
    expect(parseCatalogSelection("")).toBeNull()
  })
})
