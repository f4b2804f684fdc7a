export type Mode =
  | { readonly kind: "normal" }
  | { readonly kind: "help" }
  | { readonly kind: "command"; readonly line: string }
  | { readonly kind: "search"; readonly line: string; readonly previous: string | null }

export type ModeKind = Mode["kind"]

export const NORMAL_MODE: Mode = { kind: "normal" }
export const HELP_MODE: Mode = { kind: "help" }

export const commandMode = (): Mode => ({ kind: "command", line: "" })

export const searchMode = (previous: string | null): Mode => ({ kind: "search", line: "", previous })

const dropLastCharacter = (line: string): string => Array.from(line).slice(0, -1).join("")

/** Appends to the line of a Command or Search mode; other modes are returned unchanged. */
export const appendToLine = (mode: Mode, value: string): Mode => {
  switch (mode.kind) {
    case "command":
      return { ...mode, line: mode.line + value }
    case "search":
      return { ...mode, line: mode.line + value }
    default:
      return mode
  }
}

export const popFromLine = (mode: Mode): Mode => {
  switch (mode.kind) {
    case "command":
      return { ...mode, line: dropLastCharacter(mode.line) }
    case "search":
      return { ...mode, line: dropLastCharacter(mode.line) }
    default:
      return mode
  }
}
