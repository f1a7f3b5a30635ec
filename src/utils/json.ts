export type JsonRecord = Record<string, unknown>

export const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value)

export type JsonParseResult = { readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly error: Error }

export const parseJson = (raw: string): JsonParseResult => {
  try {
    return { ok: true, value: JSON.parse(raw) as unknown }
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) }
  }
}

export const readString = (source: JsonRecord, key: string): string | undefined => {
  const value = source[key]
  return typeof value === "string" ? value : undefined
}
