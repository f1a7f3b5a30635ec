import { Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import { buildCatalog, formatCatalogEntry, type CatalogFilter } from "../archive/catalog.js"
import { locateArchiveRoot } from "../archive/locate.js"
import type { ViewerConfig } from "../config/appConfig.js"
import { loadCommandContext, resolveCommandIdentity, toError } from "./context.js"

export const LIST_CATEGORIES = ["dm", "space", "pinned"] as const

export type ListCategory = (typeof LIST_CATEGORIES)[number]

export interface ListOptions {
  readonly category: ListCategory
  readonly viewer: string | null
}

export const NO_CHATS_FOUND = "No chats found."

const categoryOption = Options.choice("category", LIST_CATEGORIES).pipe(Options.withDefault("dm"))
const viewerOption = Options.text("viewer").pipe(Options.optional)

export const toCatalogFilter = (category: ListCategory): CatalogFilter => (category === "space" ? "group" : category)

/** Catalog lines for one category; throws when the archive or the viewer identity cannot be found. */
export const listConversations = (
  config: ViewerConfig,
  options: ListOptions,
  log: (line: string) => void,
): string[] => {
  const { archiveRoot } = locateArchiveRoot(config, log)
  const identity = resolveCommandIdentity(options.viewer, config, archiveRoot)
  if (!identity) {
    throw new Error("Could not detect your email; pass --viewer.")
  }
  const entries = buildCatalog(archiveRoot, identity, toCatalogFilter(options.category)).map(formatCatalogEntry)
  return entries.length > 0 ? entries : [NO_CHATS_FOUND]
}

export const listCommand = Command.make("list", { category: categoryOption, viewer: viewerOption }, ({ category, viewer }) =>
  Effect.gen(function* () {
    const { config } = yield* loadCommandContext()
    const lines = yield* Effect.try({
      try: () =>
        listConversations(config, { category, viewer: Option.getOrNull(viewer) }, (line) => console.error(line)),
      catch: toError,
    })
    yield* Console.log(lines.join("\n"))
  }),
)
