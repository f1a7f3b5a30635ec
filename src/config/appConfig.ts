import dotenv from "dotenv"
import { promises as fs } from "node:fs"
import os from "node:os"
import path from "node:path"
import { parse } from "yaml"
import { DEFAULT_IDENTITY_SAMPLE_LIMIT } from "../archive/identity.js"
import { ConfigError } from "../errors.js"
import { DEFAULT_BUBBLE_WIDTH_RATIO } from "../render/geometry.js"
import { defaultPagerCommand } from "../shell/pager.js"
import { DEFAULT_SELECTOR_COMMAND } from "../shell/selector.js"
import { debugLog } from "../utils/debugLog.js"
import { formatValidationIssues, validateViewerConfigInput, type ViewerConfigInput } from "./schema.js"

export interface ViewerConfig {
  readonly downloadsDir: string
  /** Explicit archive root; skips discovery under the downloads folder. */
  readonly archiveRoot: string | undefined
  /** Explicit viewer identity; skips auto-detection. */
  readonly viewer: string | undefined
  readonly identitySampleLimit: number
  readonly bubbleWidthRatio: number
  readonly selectorCommand: string
  readonly pagerCommand: string
}

export interface ResolvedViewerConfig {
  readonly config: ViewerConfig
  readonly warnings: readonly string[]
  readonly sources: readonly string[]
}

export interface ResolveConfigOptions {
  readonly env?: NodeJS.ProcessEnv
  readonly homeDir?: string
  readonly platform?: NodeJS.Platform
  /** Skip loading `.env` from the working directory into `process.env`. */
  readonly skipDotenv?: boolean
}

export const resolveUserConfigPath = (env: NodeJS.ProcessEnv, homeDir: string): string => {
  const explicit = env.CHATVIEW_CONFIG?.trim()
  if (explicit) return path.resolve(explicit)
  return path.join(homeDir, ".config", "chatview", "config.yaml")
}

const defaultConfig = (env: NodeJS.ProcessEnv, homeDir: string, platform: NodeJS.Platform): ViewerConfig => ({
  downloadsDir: path.join(homeDir, "Downloads"),
  archiveRoot: undefined,
  viewer: undefined,
  identitySampleLimit: DEFAULT_IDENTITY_SAMPLE_LIMIT,
  bubbleWidthRatio: DEFAULT_BUBBLE_WIDTH_RATIO,
  selectorCommand: DEFAULT_SELECTOR_COMMAND,
  pagerCommand: env.PAGER?.trim() || defaultPagerCommand(platform),
})

const readYamlLayer = async (filePath: string): Promise<{ config: ViewerConfigInput; warnings: string[] }> => {
  let raw: string
  try {
    raw = await fs.readFile(filePath, "utf8")
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return { config: {}, warnings: [] }
    }
    throw error
  }
  let parsed: unknown
  try {
    parsed = parse(raw)
  } catch (error) {
    throw new ConfigError(filePath, [`ERROR <root>: ${error instanceof Error ? error.message : String(error)}`])
  }
  const validated = validateViewerConfigInput(parsed)
  const errors = validated.issues.filter((issue) => issue.severity === "error")
  if (errors.length > 0) {
    throw new ConfigError(filePath, formatValidationIssues(errors))
  }
  const warnings = formatValidationIssues(validated.issues.filter((issue) => issue.severity === "warning"))
  return { config: validated.config, warnings }
}

const ENV_KEYS: Record<keyof ViewerConfigInput, string> = {
  downloadsDir: "CHATVIEW_DOWNLOADS_DIR",
  archiveRoot: "CHATVIEW_ARCHIVE_ROOT",
  viewer: "CHATVIEW_VIEWER",
  identitySampleLimit: "CHATVIEW_IDENTITY_SAMPLE",
  bubbleWidthRatio: "CHATVIEW_BUBBLE_RATIO",
  selectorCommand: "CHATVIEW_SELECTOR",
  pagerCommand: "CHATVIEW_PAGER",
}

/** Invalid environment values are ignored (and debug-logged) rather than fatal. */
const envConfigLayer = (env: NodeJS.ProcessEnv): ViewerConfigInput => {
  const source: Record<string, unknown> = {}
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName]?.trim()
    if (value) source[key] = value
  }
  const validated = validateViewerConfigInput(source)
  for (const issue of validated.issues) {
    debugLog({ ignoredEnvSetting: issue.path, message: issue.message })
  }
  return validated.config
}

const applyLayer = (base: ViewerConfig, layer: ViewerConfigInput): ViewerConfig => ({
  downloadsDir: layer.downloadsDir ? path.resolve(layer.downloadsDir) : base.downloadsDir,
  archiveRoot: layer.archiveRoot ? path.resolve(layer.archiveRoot) : base.archiveRoot,
  viewer: layer.viewer ?? base.viewer,
  identitySampleLimit: layer.identitySampleLimit ?? base.identitySampleLimit,
  bubbleWidthRatio: layer.bubbleWidthRatio ?? base.bubbleWidthRatio,
  selectorCommand: layer.selectorCommand ?? base.selectorCommand,
  pagerCommand: layer.pagerCommand ?? base.pagerCommand,
})

/** Precedence: defaults, then the YAML user config, then the environment. */
export const resolveViewerConfig = async (options: ResolveConfigOptions = {}): Promise<ResolvedViewerConfig> => {
  // `.env` only feeds the real process environment; an injected env is used as given.
  if (!options.env && !options.skipDotenv) {
    dotenv.config()
  }
  const env = options.env ?? process.env
  const homeDir = options.homeDir ?? os.homedir()
  const platform = options.platform ?? process.platform
  const sources = ["defaults"]
  let config = defaultConfig(env, homeDir, platform)

  const userConfigPath = resolveUserConfigPath(env, homeDir)
  const userLayer = await readYamlLayer(userConfigPath)
  if (Object.keys(userLayer.config).length > 0) {
    config = applyLayer(config, userLayer.config)
    sources.push(`user:${userConfigPath}`)
  }

  const envLayer = envConfigLayer(env)
  if (Object.keys(envLayer).length > 0) {
    config = applyLayer(config, envLayer)
    sources.push("env")
  }

  return {
    config,
    warnings: userLayer.warnings.map((line) => `${userConfigPath}: ${line}`),
    sources,
  }
}
