import path from "node:path"
import {
  buildCatalog,
  formatCatalogEntry,
  parseCatalogSelection,
  type CatalogFilter,
} from "../archive/catalog.js"
import { detectViewerIdentity } from "../archive/identity.js"
import { locateArchiveRoot } from "../archive/locate.js"
import { extractPinned, loadMessages, MESSAGES_FILE } from "../archive/messages.js"
import type { ViewerConfig } from "../config/appConfig.js"
import { ArchiveNotFoundError } from "../errors.js"
import type { TerminalGeometry } from "../render/geometry.js"
import { composeTranscript } from "../render/transcript.js"
import type { TranscriptTheme } from "../render/theme.js"
import type { Pager } from "../shell/pager.js"
import type { FuzzySelector } from "../shell/selector.js"

export const CATEGORY_CHOICES = ["DM", "SPACE", "PINNED ONLY"] as const

export type ViewerOutcome = "shown" | "archive-not-found" | "cancelled" | "no-conversations"

export interface ViewerDeps {
  readonly config: ViewerConfig
  readonly geometry: TerminalGeometry
  readonly selector: FuzzySelector
  readonly pager: Pager
  /** Asked only when no identity is configured and none can be detected. */
  readonly promptIdentity: () => Promise<string>
  readonly log: (line: string) => void
  readonly error: (line: string) => void
  readonly theme?: TranscriptTheme
}

export const categoryFilter = (choice: string): CatalogFilter | null => {
  if (choice.startsWith("PINNED")) return "pinned"
  if (choice.startsWith("DM")) return "dm"
  if (choice.startsWith("SPACE")) return "group"
  return null
}

const resolveViewerIdentity = async (
  archiveRoot: string,
  config: ViewerConfig,
  promptIdentity: () => Promise<string>,
): Promise<string> => {
  if (config.viewer) return config.viewer
  const detected = detectViewerIdentity(archiveRoot, { sampleLimit: config.identitySampleLimit })
  if (detected) return detected
  return (await promptIdentity()).trim()
}

/** Archive discovery, identity, category, conversation, pager. */
export const runViewer = async (deps: ViewerDeps): Promise<ViewerOutcome> => {
  const { config, selector, log } = deps
  let archiveRoot: string
  try {
    archiveRoot = locateArchiveRoot(config, log).archiveRoot
  } catch (error) {
    if (error instanceof ArchiveNotFoundError) {
      deps.error(`❌ ${error.message}`)
      return "archive-not-found"
    }
    throw error
  }
  log(`✅ Using Groups folder: ${archiveRoot}`)

  const viewer = await resolveViewerIdentity(archiveRoot, config, deps.promptIdentity)
  log(`✅ Your email: ${viewer}`)

  const category = await selector.select(CATEGORY_CHOICES, "Select Category: ")
  const filter = category ? categoryFilter(category) : null
  if (!filter) return "cancelled"

  const entries = buildCatalog(archiveRoot, viewer, filter).map(formatCatalogEntry)
  if (entries.length === 0) {
    deps.error("❌ No chats found.")
    return "no-conversations"
  }

  const selected = await selector.select(entries, "Select Chat: ")
  const folderId = selected ? parseCatalogSelection(selected) : null
  if (!folderId) return "cancelled"

  const pinnedOnly = filter === "pinned"
  const messages = loadMessages(path.join(archiveRoot, folderId, MESSAGES_FILE))
  const document = composeTranscript(pinnedOnly ? extractPinned(messages) : messages, viewer, {
    geometry: deps.geometry,
    pinnedOnly,
    theme: deps.theme,
  })
  await deps.pager.show(document)
  return "shown"
}
