import fs from "node:fs"
import path from "node:path"
import { MESSAGES_FILE } from "./messages.js"

export interface ConversationFolder {
  readonly folderId: string
  readonly folderPath: string
  readonly messagesPath: string
}

const compareCodeUnits = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

/** Subfolders of the archive root that hold a messages file, in lexical order. */
export const listConversationFolders = (archiveRoot: string): ConversationFolder[] => {
  let names: string[]
  try {
    names = fs.readdirSync(archiveRoot)
  } catch {
    return []
  }
  return names
    .sort(compareCodeUnits)
    .map((folderId) => {
      const folderPath = path.join(archiveRoot, folderId)
      return { folderId, folderPath, messagesPath: path.join(folderPath, MESSAGES_FILE) }
    })
    .filter((folder) => fs.existsSync(folder.messagesPath))
}
