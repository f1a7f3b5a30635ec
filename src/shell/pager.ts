import { spawn } from "node:child_process"
import stripAnsi from "strip-ansi"
import { debugLog } from "../utils/debugLog.js"
import { splitCommand } from "./selector.js"

export interface Pager {
  show(document: string): Promise<void>
}

export interface OutputStream {
  readonly isTTY?: boolean
  write(chunk: string): boolean
}

export const defaultPagerCommand = (platform: NodeJS.Platform = process.platform): string =>
  platform === "win32" ? "more" : "less -R"

const writeDocument = (output: OutputStream, document: string): void => {
  const text = output.isTTY ? document : stripAnsi(document)
  output.write(text.endsWith("\n") ? text : `${text}\n`)
}

/** Prints the document directly; also what the system pager falls back to. */
export const createStreamPager = (output: OutputStream = process.stdout): Pager => ({
  show: async (document) => {
    writeDocument(output, document)
  },
})

const runPager = (command: string, document: string): Promise<boolean> =>
  new Promise<boolean>((resolve) => {
    const [program, ...args] = splitCommand(command)
    const child = spawn(program, args, {
      stdio: ["pipe", "inherit", "inherit"],
      shell: process.platform === "win32",
    })
    child.on("error", (error) => {
      debugLog({ pagerSpawnError: String(error), command })
      resolve(false)
    })
    child.on("close", () => resolve(true))
    // The pager may quit before reading everything.
    child.stdin.on("error", (error) => debugLog({ pagerStdinError: String(error) }))
    child.stdin.end(document)
  })

export const createSystemPager = (command: string, output: OutputStream = process.stdout): Pager => ({
  show: async (document) => {
    if (!output.isTTY) {
      writeDocument(output, document)
      return
    }
    const shown = await runPager(command, document)
    if (!shown) {
      writeDocument(output, document)
    }
  },
})
