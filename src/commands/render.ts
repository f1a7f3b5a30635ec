import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import path from "node:path"
import { locateArchiveRoot } from "../archive/locate.js"
import { extractPinned, MESSAGES_FILE, readMessageFile } from "../archive/messages.js"
import type { ViewerConfig } from "../config/appConfig.js"
import type { TerminalGeometry } from "../render/geometry.js"
import type { TranscriptTheme } from "../render/theme.js"
import { composeTranscript } from "../render/transcript.js"
import { createStreamPager } from "../shell/pager.js"
import { loadCommandContext, resolveCommandIdentity, toError } from "./context.js"

export interface RenderOptions {
  readonly folder: string
  readonly pinned: boolean
  readonly viewer: string | null
}

export interface RenderedConversation {
  readonly document: string
  readonly warnings: readonly string[]
}

const folderArg = Args.text({ name: "folder" })
const pinnedOption = Options.boolean("pinned")
const viewerOption = Options.text("viewer").pipe(Options.optional)
const widthOption = Options.integer("width").pipe(Options.optional)

/**
 * Renders one conversation folder. An unreadable messages file renders as an empty
 * transcript with a warning; without any identity every message is aligned left.
 */
export const renderConversation = (
  config: ViewerConfig,
  geometry: TerminalGeometry,
  options: RenderOptions,
  log: (line: string) => void,
  theme?: TranscriptTheme,
): RenderedConversation => {
  const { archiveRoot } = locateArchiveRoot(config, log)
  const result = readMessageFile(path.join(archiveRoot, options.folder, MESSAGES_FILE))
  const messages = result.ok ? result.messages : []
  const identity = resolveCommandIdentity(options.viewer, config, archiveRoot) ?? ""
  const document = composeTranscript(options.pinned ? extractPinned(messages) : messages, identity, {
    geometry,
    pinnedOnly: options.pinned,
    theme,
  })
  return { document, warnings: result.ok ? [] : [result.error.message] }
}

export const renderCommand = Command.make(
  "render",
  { folder: folderArg, pinned: pinnedOption, viewer: viewerOption, width: widthOption },
  ({ folder, pinned, viewer, width }) =>
    Effect.gen(function* () {
      const { config, geometry } = yield* loadCommandContext(Option.getOrUndefined(width))
      const rendered = yield* Effect.try({
        try: () =>
          renderConversation(config, geometry, { folder, pinned, viewer: Option.getOrNull(viewer) }, (line) =>
            console.error(line),
          ),
        catch: toError,
      })
      for (const warning of rendered.warnings) {
        yield* Console.error(`Warning: ${warning}`)
      }
      yield* Effect.promise(() => createStreamPager().show(rendered.document))
    }),
)
