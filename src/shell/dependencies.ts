import fs from "node:fs"
import path from "node:path"
import { MissingDependencyError } from "../errors.js"
import { splitCommand } from "./selector.js"

export const MIN_NODE_MAJOR = 20

export interface DependencyCheck {
  readonly name: string
  readonly ok: boolean
  readonly detail: string
}

export interface DependencyEnvironment {
  readonly nodeVersion: string
  readonly platform: NodeJS.Platform
  readonly env: NodeJS.ProcessEnv
}

const currentEnvironment = (): DependencyEnvironment => ({
  nodeVersion: process.versions.node,
  platform: process.platform,
  env: process.env,
})

const isExecutableFile = (candidate: string, platform: NodeJS.Platform): boolean => {
  try {
    if (!fs.statSync(candidate).isFile()) return false
    if (platform !== "win32") fs.accessSync(candidate, fs.constants.X_OK)
    return true
  } catch {
    return false
  }
}

/** Resolves a program name against PATH (and PATHEXT on Windows), like `which`. */
export const findExecutable = (program: string, environment: DependencyEnvironment = currentEnvironment()): string | null => {
  const { env, platform } = environment
  const delimiter = platform === "win32" ? ";" : ":"
  const extensions =
    platform === "win32" ? ["", ...(env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";").filter(Boolean)] : [""]
  if (program.includes("/") || program.includes("\\")) {
    return extensions.map((ext) => program + ext).find((candidate) => isExecutableFile(candidate, platform)) ?? null
  }
  const dirs = (env.PATH ?? env.Path ?? "").split(delimiter).filter(Boolean)
  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, program + ext)
      if (isExecutableFile(candidate, platform)) return candidate
    }
  }
  return null
}

export const selectorInstallHint = (platform: NodeJS.Platform): string[] => {
  switch (platform) {
    case "linux":
      return [
        "Install fzf using:",
        "   sudo apt install fzf     # Ubuntu/Debian",
        "   sudo dnf install fzf     # Fedora",
        "   sudo pacman -S fzf       # Arch",
      ]
    case "darwin":
      return ["Install fzf using:", "   brew install fzf"]
    case "win32":
      return ["Install fzf using:", "   choco install fzf", "or use Winget:", "   winget install fzf"]
    default:
      return ["Please install fzf manually from:", "   https://github.com/junegunn/fzf"]
  }
}

export const nodeMajor = (version: string): number => Number.parseInt(version.split(".")[0] ?? "", 10)

export const runDependencyChecks = (
  selectorCommand: string,
  environment: DependencyEnvironment = currentEnvironment(),
): DependencyCheck[] => {
  const major = nodeMajor(environment.nodeVersion)
  const [program] = splitCommand(selectorCommand)
  const selectorPath = findExecutable(program, environment)
  return [
    {
      name: "node",
      ok: Number.isFinite(major) && major >= MIN_NODE_MAJOR,
      detail: `Node.js ${environment.nodeVersion} (requires ${MIN_NODE_MAJOR}+)`,
    },
    {
      name: program,
      ok: selectorPath !== null,
      detail: selectorPath ?? `${program} not found on PATH`,
    },
  ]
}

/** Throws MissingDependencyError for the first failed check. */
export const checkDependencies = (
  selectorCommand: string,
  environment: DependencyEnvironment = currentEnvironment(),
): DependencyCheck[] => {
  const checks = runDependencyChecks(selectorCommand, environment)
  const [nodeCheck, selectorCheck] = checks
  if (!nodeCheck.ok) {
    throw new MissingDependencyError("node", `❌ Node.js ${MIN_NODE_MAJOR}+ is required.`, [
      `Your version: ${environment.nodeVersion}`,
    ])
  }
  if (!selectorCheck.ok) {
    throw new MissingDependencyError(
      selectorCheck.name,
      `❌ Missing dependency: ${selectorCheck.name}`,
      selectorInstallHint(environment.platform),
    )
  }
  return checks
}
