import { Either } from "effect"
import { plainPages, type ArgsClassifier } from "../render/classifyArgs.js"

export type ParsedCommand =
  | { readonly kind: "man"; readonly pages: ReadonlyArray<string>; readonly category: string | null }
  | { readonly kind: "help" }
  | { readonly kind: "quit" }
  | { readonly kind: "wipe" }
  | { readonly kind: "empty" }
  | { readonly kind: "unknown"; readonly command: string }

export interface OpenRequest {
  readonly pages: ReadonlyArray<string>
  readonly category: string | null
}

export const COMMAND_SUMMARY: ReadonlyArray<{ readonly usage: string; readonly summary: string }> = [
  { usage: "man [CATEGORY] NAME...", summary: "Open one or more pages in new tabs." },
  { usage: "help, h", summary: "Show the help screen." },
  { usage: "wipe, w", summary: "Close the current tab." },
  { usage: "quit, q", summary: "Leave mantabs." },
]

/**
 * Resolves page tokens the way both startup arguments and `:man` do: a single
 * token is a page; more go through the classifier, falling back to a plain
 * page list when classification fails.
 */
export const resolveOpenRequest = (tokens: ReadonlyArray<string>, classify: ArgsClassifier): OpenRequest => {
  if (tokens.length <= 1) return { pages: [...tokens], category: null }
  const interpretation = Either.getOrElse(classify(tokens), () => plainPages(tokens))
  return interpretation.kind === "categoryAndPages"
    ? { pages: interpretation.pages, category: interpretation.category }
    : { pages: interpretation.pages, category: null }
}

export const parseCommand = (line: string, classify: ArgsClassifier): ParsedCommand => {
  const [command, ...args] = line.trim().split(/\s+/).filter((part) => part.length > 0)
  if (command === undefined) return { kind: "empty" }
  switch (command) {
    case "man": {
      if (args.length === 0) return { kind: "unknown", command }
      const request = resolveOpenRequest(args, classify)
      if (request.pages.length === 0) return { kind: "unknown", command }
      return { kind: "man", pages: request.pages, category: request.category }
    }
    case "help":
    case "h":
      return { kind: "help" }
    case "quit":
    case "q":
      return { kind: "quit" }
    case "wipe":
    case "w":
      return { kind: "wipe" }
    default:
      return { kind: "unknown", command }
  }
}
