import { Either } from "effect"
import { describeExit, spawnCommandRunner, type CommandRunner } from "./commandRunner.js"
import { ContentNotFound, RenderFault, type ManRenderer, type RenderResult } from "./types.js"

export interface SystemManRendererOptions {
  readonly manBinary?: string
  readonly colBinary?: string
  readonly runner?: CommandRunner
  readonly env?: NodeJS.ProcessEnv
}

const decoder = new TextDecoder("utf-8", { fatal: true })

export const splitRenderedLines = (text: string): string[] => {
  if (text.length === 0) return []
  const lines = text.split(/\r?\n/)
  if (lines[lines.length - 1] === "") lines.pop()
  return lines
}

/**
 * Renders pages through the system `man`, with backspace overstrikes removed
 * by `col -bx` so every line is plain text at the requested width.
 */
export class SystemManRenderer implements ManRenderer {
  private readonly manBinary: string
  private readonly colBinary: string
  private readonly runner: CommandRunner
  private readonly env: NodeJS.ProcessEnv

  constructor(options: SystemManRendererOptions = {}) {
    this.manBinary = options.manBinary ?? "man"
    this.colBinary = options.colBinary ?? "col"
    this.runner = options.runner ?? spawnCommandRunner
    this.env = options.env ?? process.env
  }

  render(name: string, category: string | null, width: number): RenderResult {
    const safeWidth = String(Math.max(1, Math.floor(width) || 1))
    const args = category ? [category, name] : [name]
    const man = this.runner(this.manBinary, args, {
      env: { ...this.env, MANWIDTH: safeWidth, MANPAGER: "cat" },
    })
    if (man.error) {
      return Either.left(new RenderFault({ message: `failed to run ${this.manBinary}: ${man.error.message}` }))
    }
    if (man.status !== 0) {
      const stderr = man.stderr.toString("utf8").trim()
      return Either.left(new ContentNotFound({ message: stderr || describeExit(this.manBinary, man) }))
    }

    const col = this.runner(this.colBinary, ["-bx"], { env: this.env, input: man.stdout })
    if (col.error) {
      return Either.left(new RenderFault({ message: `failed to run ${this.colBinary}: ${col.error.message}` }))
    }
    if (col.status !== 0) {
      return Either.left(new ContentNotFound({ message: describeExit(this.colBinary, col) }))
    }

    let text: string
    try {
      text = decoder.decode(col.stdout)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      return Either.left(new RenderFault({ message: `${this.manBinary} produced invalid UTF-8 output: ${reason}` }))
    }
    return Either.right(splitRenderedLines(text))
  }
}
