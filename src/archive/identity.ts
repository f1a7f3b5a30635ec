import { listConversationFolders } from "./folders.js"
import { loadMessages } from "./messages.js"

export const DEFAULT_IDENTITY_SAMPLE_LIMIT = 200

export interface IdentityDetectionOptions {
  /** Messages inspected per conversation, from the start of each file. */
  readonly sampleLimit?: number
}

/**
 * Presumes the viewer is the most frequent sender across the archive.
 * Returns null when no sender id is seen at all.
 */
export const detectViewerIdentity = (archiveRoot: string, options: IdentityDetectionOptions = {}): string | null => {
  const sampleLimit = options.sampleLimit ?? DEFAULT_IDENTITY_SAMPLE_LIMIT
  const counts = new Map<string, number>()
  for (const folder of listConversationFolders(archiveRoot)) {
    for (const message of loadMessages(folder.messagesPath).slice(0, sampleLimit)) {
      if (!message.senderId) continue
      counts.set(message.senderId, (counts.get(message.senderId) ?? 0) + 1)
    }
  }
  let best: string | null = null
  let bestCount = 0
  for (const [identity, count] of counts) {
    if (count > bestCount) {
      best = identity
      bestCount = count
    }
  }
  return best
}
