export class MissingDependencyError extends Error {
  readonly dependency: string
  readonly remediation: readonly string[]

  constructor(dependency: string, message: string, remediation: readonly string[]) {
    super(message)
    this.name = "MissingDependencyError"
    this.dependency = dependency
    this.remediation = remediation
  }
}

export class ArchiveNotFoundError extends Error {
  readonly searched: string

  constructor(message: string, searched: string) {
    super(message)
    this.name = "ArchiveNotFoundError"
    this.searched = searched
  }
}

export class ArchiveExtractionError extends Error {
  readonly zipPath: string

  constructor(zipPath: string, cause: unknown) {
    super(`Failed to extract ${zipPath}: ${cause instanceof Error ? cause.message : String(cause)}`)
    this.name = "ArchiveExtractionError"
    this.zipPath = zipPath
  }
}

/** A messages file that could not be read or parsed. Always recovered as "no messages". */
export class MalformedMessageFileError extends Error {
  readonly path: string

  constructor(path: string, reason: string) {
    super(`Malformed message file ${path}: ${reason}`)
    this.name = "MalformedMessageFileError"
    this.path = path
  }
}

export class ConfigError extends Error {
  readonly issues: readonly string[]

  constructor(source: string, issues: readonly string[]) {
    super(`Invalid chatview config at ${source}\n${issues.join("\n")}`)
    this.name = "ConfigError"
    this.issues = issues
  }
}
