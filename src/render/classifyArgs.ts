import { Data, Either } from "effect"
import { spawnCommandRunner, type CommandRunner } from "./commandRunner.js"

export type ArgsInterpretation =
  | { readonly kind: "categoryAndPages"; readonly category: string; readonly pages: ReadonlyArray<string> }
  | { readonly kind: "pages"; readonly pages: ReadonlyArray<string> }

export const plainPages = (pages: ReadonlyArray<string>): ArgsInterpretation => ({ kind: "pages", pages })

export const categoryAndPages = (category: string, pages: ReadonlyArray<string>): ArgsInterpretation => ({
  kind: "categoryAndPages",
  category,
  pages,
})

export class ClassificationFault extends Data.TaggedError("ClassificationFault")<{
  readonly message: string
}> {}

export type ClassificationResult = Either.Either<ArgsInterpretation, ClassificationFault>

/** Answers whether `page` resolves under `category`. */
export type PageProbe = (category: string, page: string) => Either.Either<boolean, ClassificationFault>

export type ArgsClassifier = (tokens: ReadonlyArray<string>) => ClassificationResult

// The first token counts as a category as soon as any one of the remaining
// tokens resolves under it.
export const classifyArgs = (tokens: ReadonlyArray<string>, probe: PageProbe): ClassificationResult => {
  const [first, ...rest] = tokens
  if (first === undefined) return Either.right(plainPages([]))
  if (rest.length === 0) return Either.right(plainPages([first]))

  for (const page of rest) {
    const exists = probe(first, page)
    if (Either.isLeft(exists)) return Either.left(exists.left)
    if (exists.right) return Either.right(categoryAndPages(first, rest))
  }
  return Either.right(plainPages([first, ...rest]))
}

export interface ManClassifierOptions {
  readonly manBinary?: string
  readonly runner?: CommandRunner
}

export const createManProbe = (options: ManClassifierOptions = {}): PageProbe => {
  const manBinary = options.manBinary ?? "man"
  const runner = options.runner ?? spawnCommandRunner
  return (category, page) => {
    const result = runner(manBinary, ["-w", "-S", category, page])
    if (result.error) {
      return Either.left(new ClassificationFault({ message: `failed to run ${manBinary}: ${result.error.message}` }))
    }
    return Either.right(result.status === 0)
  }
}

export const createManClassifier = (options: ManClassifierOptions = {}): ArgsClassifier => {
  const probe = createManProbe(options)
  return (tokens) => classifyArgs(tokens, probe)
}
