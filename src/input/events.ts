export type NamedKey =
  | "backspace"
  | "enter"
  | "escape"
  | "up"
  | "down"
  | "left"
  | "right"
  | "pageUp"
  | "pageDown"
  | "tab"
  | "backTab"

export type KeyPress =
  | { readonly kind: "char"; readonly char: string; readonly ctrl: boolean }
  | { readonly kind: NamedKey }

export type InputEvent =
  | { readonly kind: "key"; readonly key: KeyPress }
  | { readonly kind: "resize"; readonly width: number; readonly height: number }
  | { readonly kind: "unsupported" }

export const charKey = (char: string, ctrl = false): KeyPress => ({ kind: "char", char, ctrl })

export const namedKey = (kind: NamedKey): KeyPress => ({ kind })
