import { createWriteStream, mkdirSync } from "node:fs"
import path from "node:path"

export type DebugFields = Readonly<Record<string, string | number | boolean | null>>

export interface DebugLog {
  readonly enabled: boolean
  write(event: string, fields?: DebugFields): void
  close(): Promise<void>
}

export const noopDebugLog: DebugLog = {
  enabled: false,
  write: () => undefined,
  close: async () => undefined,
}

/**
 * Append-only JSON lines log. The terminal belongs to the pager while it runs,
 * so this file is the only place diagnostics go.
 */
export const createDebugLog = (filePath: string, now: () => number = Date.now): DebugLog => {
  const resolved = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath)
  mkdirSync(path.dirname(resolved), { recursive: true })
  const stream = createWriteStream(resolved, { flags: "a" })
  let closed = false
  // Open and write failures arrive asynchronously; the log stops and close() reports the first one.
  let failure: Error | null = null
  stream.on("error", (error) => {
    failure ??= error
    closed = true
  })
  return {
    enabled: true,
    write: (event, fields) => {
      if (closed) return
      stream.write(`${JSON.stringify({ timestamp: now(), event, ...fields })}\n`)
    },
    close: async () => {
      if (!closed) {
        closed = true
        await new Promise<void>((resolve) => {
          stream.once("error", () => resolve())
          stream.end(() => resolve())
        })
      }
      const error = failure
      failure = null
      if (error) throw error
    },
  }
}
