import { spawn } from "node:child_process"
import { debugLog } from "../utils/debugLog.js"

export const DEFAULT_SELECTOR_COMMAND = "fzf"

export interface FuzzySelector {
  /** Resolves to the chosen line, or null when the user aborts. */
  select(candidates: readonly string[], prompt: string): Promise<string | null>
}

export const splitCommand = (command: string): [string, ...string[]] => {
  const [program = "", ...args] = command.trim().split(/\s+/)
  return [program, ...args]
}

/** Line protocol: candidates on stdin, the selected line on stdout. */
export const createFzfSelector = (command: string = DEFAULT_SELECTOR_COMMAND): FuzzySelector => ({
  select: (candidates, prompt) =>
    new Promise<string | null>((resolve, reject) => {
      const [program, ...baseArgs] = splitCommand(command)
      const child = spawn(program, [...baseArgs, "--prompt", prompt], {
        stdio: ["pipe", "pipe", "inherit"],
      })
      let stdout = ""
      child.stdout.setEncoding("utf8")
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk
      })
      child.on("error", (error) => reject(error))
      child.on("close", (code) => {
        const selected = stdout.trim()
        if (code !== 0 || selected.length === 0) {
          debugLog({ selectorAborted: program, code })
          resolve(null)
          return
        }
        resolve(selected)
      })
      child.stdin.on("error", (error) => debugLog({ selectorStdinError: String(error) }))
      child.stdin.end(candidates.join("\n"))
    }),
})
