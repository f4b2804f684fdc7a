import { Either } from "effect"
import { plainPages, type ArgsClassifier } from "../../src/render/classifyArgs.js"
import { ContentNotFound, RenderFault, type ManRenderer, type RenderResult } from "../../src/render/types.js"

export interface RenderCall {
  readonly name: string
  readonly category: string | null
  readonly width: number
}

/**
 * In-memory renderer. Pages are keyed by `name` or `name(category)`; anything
 * else is reported the way `man` reports a missing entry.
 */
export class FakeManRenderer implements ManRenderer {
  readonly calls: RenderCall[] = []
  private readonly faults = new Set<string>()

  constructor(private readonly pages: Readonly<Record<string, ReadonlyArray<string>>>) {}

  failWith(name: string): this {
    this.faults.add(name)
    return this
  }

  render(name: string, category: string | null, width: number): RenderResult {
    this.calls.push({ name, category, width })
    if (this.faults.has(name)) {
      return Either.left(new RenderFault({ message: `renderer broke on ${name}` }))
    }
    const key = category ? `${name}(${category})` : name
    const lines = this.pages[key]
    if (!lines) return Either.left(new ContentNotFound({ message: `No manual entry for ${name}` }))
    return Either.right(lines)
  }
}

export const numberedLines = (count: number, prefix = "line"): string[] =>
  Array.from({ length: count }, (_, index) => `${prefix} ${index}`)

export const pagesOnly: ArgsClassifier = (tokens) => Either.right(plainPages(tokens))

export const expectLeft = <R, L>(result: Either.Either<R, L>): L => {
  if (Either.isRight(result)) throw new Error(`expected Left, received Right(${String(result.right)})`)
  return result.left
}

export const expectRight = <R, L>(result: Either.Either<R, L>): R => {
  if (Either.isLeft(result)) throw new Error(`expected Right, received Left(${String(result.left)})`)
  return result.right
}
