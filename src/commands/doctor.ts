import { Command } from "@effect/cli"
import { Console, Effect } from "effect"
import { findExistingArchive, findLatestArchiveZip } from "../archive/locate.js"
import { runDependencyChecks, type DependencyEnvironment } from "../shell/dependencies.js"
import { loadCommandContext, type CommandContext } from "./context.js"

export interface DoctorReport {
  readonly lines: readonly string[]
  /** Names of the failed dependency checks. */
  readonly missing: readonly string[]
}

const formatValue = (value: string | number | null | undefined): string =>
  value === null || value === undefined || value === "" ? "not set" : String(value)

export const buildDoctorReport = (context: CommandContext, environment?: DependencyEnvironment): DoctorReport => {
  const { config, sources, geometry } = context
  const checks = runDependencyChecks(config.selectorCommand, environment)
  const archiveRoot = config.archiveRoot ?? findExistingArchive(config.downloadsDir)
  const zipPath = archiveRoot ? null : findLatestArchiveZip(config.downloadsDir)
  const lines = [
    "chatview doctor",
    ...checks.map((check) => `${check.ok ? "✅" : "❌"} ${check.name}: ${check.detail}`),
    `Config sources: ${sources.join(" → ")}`,
    `Downloads: ${config.downloadsDir}`,
    `Viewer: ${formatValue(config.viewer)}`,
    `Selector: ${config.selectorCommand}`,
    `Pager: ${config.pagerCommand}`,
    `Terminal width: ${geometry.terminalWidth} (bubble content ${geometry.contentWidth})`,
    `Archive root: ${formatValue(archiveRoot)}${zipPath ? ` (extractable from ${zipPath})` : ""}`,
  ]
  return { lines, missing: checks.filter((check) => !check.ok).map((check) => check.name) }
}

export const doctorCommand = Command.make("doctor", {}, () =>
  Effect.gen(function* () {
    const report = buildDoctorReport(yield* loadCommandContext())
    yield* Console.log(report.lines.join("\n"))
    if (report.missing.length > 0) {
      return yield* Effect.fail(new Error(`Missing dependencies: ${report.missing.join(", ")}`))
    }
  }),
)
