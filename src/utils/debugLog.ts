const DEBUG_ENV = "CHATVIEW_DEBUG"

const isDebugEnabled = (): boolean => process.env[DEBUG_ENV] === "1"

export const debugLog = (payload: Record<string, unknown>): void => {
  if (isDebugEnabled()) {
    console.error(JSON.stringify(payload))
  }
}
