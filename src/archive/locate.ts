import fs from "node:fs"
import path from "node:path"
import AdmZip from "adm-zip"
import { ArchiveExtractionError, ArchiveNotFoundError } from "../errors.js"

export const ARCHIVE_GROUPS_PATH = ["Takeout", "Google Chat", "Groups"] as const
const ZIP_PREFIX = "takeout-"
const ZIP_SUFFIX = ".zip"

export interface ArchiveLocation {
  readonly archiveRoot: string
  readonly source: "configured" | "extracted" | "zip"
  readonly zipPath?: string
}

export interface LocateOptions {
  readonly downloadsDir: string
  readonly archiveRoot?: string
}

const isDirectory = (target: string): boolean => {
  try {
    return fs.statSync(target).isDirectory()
  } catch {
    return false
  }
}

export const findExistingArchive = (downloadsDir: string): string | null => {
  const groupsPath = path.join(downloadsDir, ...ARCHIVE_GROUPS_PATH)
  return isDirectory(groupsPath) ? groupsPath : null
}

/** Newest `takeout-*.zip` by modification time; equal times keep listing order. */
export const findLatestArchiveZip = (downloadsDir: string): string | null => {
  let names: string[]
  try {
    names = fs.readdirSync(downloadsDir)
  } catch {
    return null
  }
  const candidates = names
    .filter((name) => name.startsWith(ZIP_PREFIX) && name.endsWith(ZIP_SUFFIX))
    .flatMap((name) => {
      const fullPath = path.join(downloadsDir, name)
      const stats = fs.statSync(fullPath, { throwIfNoEntry: false })
      // Dangling symlinks have nothing to extract.
      return stats?.isFile() ? [{ fullPath, mtimeMs: stats.mtimeMs }] : []
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs)
  return candidates[0]?.fullPath ?? null
}

export const extractArchive = (zipPath: string, targetDir: string): void => {
  try {
    new AdmZip(zipPath).extractAllTo(targetDir, true)
  } catch (error) {
    throw new ArchiveExtractionError(zipPath, error)
  }
}

/**
 * Resolves the archive root: a configured root wins, then an existing extraction
 * under the downloads folder, then the newest takeout zip extracted in place.
 */
export const locateArchiveRoot = (options: LocateOptions, log: (line: string) => void): ArchiveLocation => {
  if (options.archiveRoot) {
    if (!isDirectory(options.archiveRoot)) {
      throw new ArchiveNotFoundError(`Configured archive root not found: ${options.archiveRoot}`, options.archiveRoot)
    }
    return { archiveRoot: options.archiveRoot, source: "configured" }
  }
  const existing = findExistingArchive(options.downloadsDir)
  if (existing) {
    log("✅ Found extracted Takeout folder.")
    return { archiveRoot: existing, source: "extracted" }
  }
  const zipPath = findLatestArchiveZip(options.downloadsDir)
  if (!zipPath) {
    throw new ArchiveNotFoundError(`No ${ZIP_PREFIX}*${ZIP_SUFFIX} found in ${options.downloadsDir}.`, options.downloadsDir)
  }
  log(`✅ Found latest ZIP: ${zipPath}`)
  log("📦 Extracting ZIP...")
  extractArchive(zipPath, options.downloadsDir)
  log("✅ Extraction completed.")
  const extracted = findExistingArchive(options.downloadsDir)
  if (!extracted) {
    throw new ArchiveNotFoundError("Extracted, but Groups folder not found.", zipPath)
  }
  return { archiveRoot: extracted, source: "zip", zipPath }
}
