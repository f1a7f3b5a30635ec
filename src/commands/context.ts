import { Console, Effect } from "effect"
import { detectViewerIdentity } from "../archive/identity.js"
import { resolveViewerConfig, type ResolvedViewerConfig, type ViewerConfig } from "../config/appConfig.js"
import { MissingDependencyError } from "../errors.js"
import { computeGeometry, resolveTerminalWidth, type TerminalGeometry } from "../render/geometry.js"
import { checkDependencies, type DependencyEnvironment } from "../shell/dependencies.js"

export interface CommandContext extends ResolvedViewerConfig {
  readonly geometry: TerminalGeometry
}

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)))

/** `--width` wins over the terminal's own width. */
export const commandGeometry = (
  config: ViewerConfig,
  widthOverride?: number,
  stream: { readonly columns?: number } = process.stdout,
): TerminalGeometry => computeGeometry(widthOverride ?? resolveTerminalWidth(stream), config.bubbleWidthRatio)

/** `--viewer`, then the configured identity, then detection from the archive. */
export const resolveCommandIdentity = (
  override: string | null,
  config: ViewerConfig,
  archiveRoot: string,
): string | null =>
  override ?? config.viewer ?? detectViewerIdentity(archiveRoot, { sampleLimit: config.identitySampleLimit })

/** The single line (or block) printed for a failed command. */
export const formatCommandFailure = (error: unknown): string => {
  if (error instanceof MissingDependencyError) {
    return [error.message, "", ...error.remediation].join("\n")
  }
  return `❌ ${toError(error).message}`
}

export const loadCommandContext = (widthOverride?: number) =>
  Effect.gen(function* () {
    const resolved = yield* Effect.tryPromise({
      try: () => resolveViewerConfig(),
      catch: toError,
    })
    for (const warning of resolved.warnings) {
      yield* Console.error(`Warning: ${warning}`)
    }
    const context: CommandContext = {
      ...resolved,
      geometry: commandGeometry(resolved.config, widthOverride),
    }
    return context
  })

/** Fails with MissingDependencyError; the remediation is printed once, by the CLI entry point. */
export const requireDependencies = (selectorCommand: string, environment?: DependencyEnvironment) =>
  Effect.try({
    try: () => checkDependencies(selectorCommand, environment),
    catch: toError,
  })
