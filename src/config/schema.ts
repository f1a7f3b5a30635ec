import { isRecord } from "../utils/json.js"

export interface ViewerConfigInput {
  downloadsDir?: string
  archiveRoot?: string
  viewer?: string
  identitySampleLimit?: number
  bubbleWidthRatio?: number
  selectorCommand?: string
  pagerCommand?: string
}

export type ValidationIssue = {
  readonly severity: "error" | "warning"
  readonly path: string
  readonly message: string
}

export type ValidationResult = {
  readonly config: ViewerConfigInput
  readonly issues: readonly ValidationIssue[]
}

const STRING_KEYS = ["downloadsDir", "archiveRoot", "viewer", "selectorCommand", "pagerCommand"] as const
const KNOWN_KEYS = new Set<string>([...STRING_KEYS, "identitySampleLimit", "bubbleWidthRatio"])

const readString = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): string | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const value = source[key]
  if (typeof value !== "string") {
    issues.push({ severity: "error", path: key, message: `Expected string, received ${typeof value}.` })
    return undefined
  }
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

const toNumber = (value: unknown): number =>
  typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : Number.NaN

const readPositiveInt = (
  source: Record<string, unknown>,
  key: string,
  issues: ValidationIssue[],
): number | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = toNumber(source[key])
  if (!Number.isInteger(parsed) || parsed < 1) {
    issues.push({ severity: "error", path: key, message: "Expected positive integer." })
    return undefined
  }
  return parsed
}

const readRatio = (source: Record<string, unknown>, key: string, issues: ValidationIssue[]): number | undefined => {
  if (!(key in source) || source[key] == null) return undefined
  const parsed = toNumber(source[key])
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > 1) {
    issues.push({ severity: "error", path: key, message: "Expected a number greater than 0 and at most 1." })
    return undefined
  }
  return parsed
}

export const validateViewerConfigInput = (input: unknown): ValidationResult => {
  const issues: ValidationIssue[] = []
  if (input == null) return { config: {}, issues }
  if (!isRecord(input)) {
    return { config: {}, issues: [{ severity: "error", path: "<root>", message: "Expected a mapping of settings." }] }
  }
  const config: ViewerConfigInput = {}
  for (const key of STRING_KEYS) {
    const value = readString(input, key, issues)
    if (value !== undefined) config[key] = value
  }
  const sampleLimit = readPositiveInt(input, "identitySampleLimit", issues)
  if (sampleLimit !== undefined) config.identitySampleLimit = sampleLimit
  const ratio = readRatio(input, "bubbleWidthRatio", issues)
  if (ratio !== undefined) config.bubbleWidthRatio = ratio
  for (const key of Object.keys(input)) {
    if (!KNOWN_KEYS.has(key)) {
      issues.push({ severity: "warning", path: key, message: "Unknown key." })
    }
  }
  return { config, issues }
}

export const formatValidationIssues = (issues: readonly ValidationIssue[]): string[] =>
  issues.map((issue) => `${issue.severity.toUpperCase()} ${issue.path}: ${issue.message}`)
