import fs from "node:fs"
import { MalformedMessageFileError } from "../errors.js"
import { debugLog } from "../utils/debugLog.js"
import { isRecord, parseJson, readString, type JsonRecord } from "../utils/json.js"

export const MESSAGES_FILE = "messages.json"
export const PINNED_LABEL = "PINNED"
export const UNKNOWN_SENDER = "Unknown"

export interface Message {
  /** `null` when the export has no usable name (absent, empty or the "Unknown" placeholder). */
  readonly senderName: string | null
  readonly senderId: string | null
  /** Trimmed; empty for attachments, reactions and other non-text content. */
  readonly text: string
  /** Raw `created_date` as exported. */
  readonly timestamp: string
  readonly pinned: boolean
}

export type MessageFileResult =
  | { readonly ok: true; readonly messages: readonly Message[] }
  | { readonly ok: false; readonly error: MalformedMessageFileError }

const hasPinnedLabel = (record: JsonRecord): boolean => {
  const labels = record.message_labels
  if (!Array.isArray(labels)) return false
  return labels.some((label) => isRecord(label) && label.label_type === PINNED_LABEL)
}

export const normalizeMessage = (record: JsonRecord): Message => {
  const creator: JsonRecord = isRecord(record.creator) ? record.creator : {}
  const name = readString(creator, "name")?.trim()
  const email = readString(creator, "email")?.trim()
  return {
    senderName: name && name !== UNKNOWN_SENDER ? name : null,
    senderId: email ? email : null,
    text: (readString(record, "text") ?? "").trim(),
    timestamp: readString(record, "created_date") ?? "",
    pinned: hasPinnedLabel(record),
  }
}

/** Accepts `{ "messages": [...] }` or a bare list; anything else holds no messages. */
const extractMessageRecords = (data: unknown): JsonRecord[] => {
  const list = isRecord(data) ? data.messages : data
  if (!Array.isArray(list)) return []
  return list.filter(isRecord)
}

export const readMessageFile = (filePath: string): MessageFileResult => {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, "utf8")
  } catch (error) {
    const reason = (error as NodeJS.ErrnoException).code ?? String(error)
    return { ok: false, error: new MalformedMessageFileError(filePath, reason) }
  }
  const parsed = parseJson(raw)
  if (!parsed.ok) {
    return { ok: false, error: new MalformedMessageFileError(filePath, parsed.error.message) }
  }
  return { ok: true, messages: extractMessageRecords(parsed.value).map(normalizeMessage) }
}

/** Never throws: an unreadable or malformed file is a conversation with no messages. */
export const loadMessages = (filePath: string): readonly Message[] => {
  const result = readMessageFile(filePath)
  if (result.ok) return result.messages
  debugLog({ malformedMessageFile: result.error.path, reason: result.error.message })
  return []
}

export const isPinned = (message: Message): boolean => message.pinned

export const hasText = (message: Message): boolean => message.text.length > 0

export const countPinned = (messages: readonly Message[]): number => messages.filter(isPinned).length

export const extractPinned = (messages: readonly Message[]): Message[] => messages.filter(isPinned)

export const senderLabel = (message: Message): string => message.senderName ?? UNKNOWN_SENDER
