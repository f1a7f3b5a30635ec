import fs from "node:fs"
import path from "node:path"
import { padEnd } from "../text/width.js"
import { debugLog } from "../utils/debugLog.js"
import { isRecord, parseJson, readString } from "../utils/json.js"
import { listConversationFolders } from "./folders.js"
import { countPinned, loadMessages, type Message } from "./messages.js"

export const GROUP_INFO_FILE = "group_info.json"
export const DELETED_USER = "Deleted User"

const DM_PREFIX = "DM"
const GROUP_PREFIX = "Space"
const LABEL_COLUMN_WIDTH = 45

export type ConversationKind = "dm" | "group"

export type CatalogFilter = "dm" | "group" | "pinned"

export type ConversationLabel =
  | { readonly kind: "participant"; readonly name: string }
  | { readonly kind: "deleted-user" }
  | { readonly kind: "title"; readonly title: string }
  | { readonly kind: "folder"; readonly folderId: string }

export interface Conversation {
  readonly folderId: string
  readonly kind: ConversationKind
  readonly label: ConversationLabel
  /** Pinned messages in the transcript, counted when the catalog is built. */
  readonly pinnedCount: number
}

export const classifyFolder = (folderId: string): ConversationKind | null => {
  if (folderId.startsWith(DM_PREFIX)) return "dm"
  if (folderId.startsWith(GROUP_PREFIX)) return "group"
  return null
}

/** First named counterpart in file order. Not a directory lookup. */
export const resolveDmParticipant = (messages: readonly Message[], viewerIdentity: string): ConversationLabel => {
  for (const message of messages) {
    if (message.senderId === viewerIdentity) continue
    if (message.senderName) return { kind: "participant", name: message.senderName }
  }
  return { kind: "deleted-user" }
}

const readGroupTitle = (folderPath: string): string | null => {
  const infoPath = path.join(folderPath, GROUP_INFO_FILE)
  if (!fs.existsSync(infoPath)) return null
  let raw: string
  try {
    raw = fs.readFileSync(infoPath, "utf8")
  } catch (error) {
    debugLog({ groupInfoUnreadable: infoPath, error: String(error) })
    return null
  }
  const parsed = parseJson(raw)
  if (!parsed.ok || !isRecord(parsed.value)) {
    debugLog({ groupInfoMalformed: infoPath })
    return null
  }
  const title = readString(parsed.value, "name")
  return title ? title : null
}

const resolveGroupLabel = (folderId: string, folderPath: string): ConversationLabel => {
  const title = readGroupTitle(folderPath)
  return title ? { kind: "title", title } : { kind: "folder", folderId }
}

const acceptsKind = (filter: CatalogFilter, kind: ConversationKind): boolean => filter === "pinned" || filter === kind

export const buildCatalog = (archiveRoot: string, viewerIdentity: string, filter: CatalogFilter): Conversation[] => {
  const catalog: Conversation[] = []
  for (const folder of listConversationFolders(archiveRoot)) {
    const kind = classifyFolder(folder.folderId)
    if (!kind || !acceptsKind(filter, kind)) continue
    const messages = loadMessages(folder.messagesPath)
    const pinnedCount = countPinned(messages)
    if (filter === "pinned" && pinnedCount === 0) continue
    const label =
      kind === "dm"
        ? resolveDmParticipant(messages, viewerIdentity)
        : resolveGroupLabel(folder.folderId, folder.folderPath)
    catalog.push({ folderId: folder.folderId, kind, label, pinnedCount })
  }
  return catalog
}

const labelName = (label: ConversationLabel): string => {
  switch (label.kind) {
    case "participant":
      return label.name
    case "deleted-user":
      return DELETED_USER
    case "title":
      return label.title
    case "folder":
      return label.folderId
  }
}

export const labelText = (conversation: Conversation): string => {
  const name = labelName(conversation.label)
  return conversation.pinnedCount > 0 ? `${name} (📌 ${conversation.pinnedCount})` : name
}

export const formatCatalogEntry = (conversation: Conversation): string => {
  const tag = conversation.kind === "dm" ? "DM" : "SP"
  return `${tag}  ${padEnd(labelText(conversation), LABEL_COLUMN_WIDTH)} | ${conversation.folderId}`
}

/** Folder id from a selected catalog line, i.e. the text after the last `|`. */
export const parseCatalogSelection = (line: string): string | null => {
  const folderId = line.slice(line.lastIndexOf("|") + 1).trim()
  return folderId.length > 0 ? folderId : null
}
