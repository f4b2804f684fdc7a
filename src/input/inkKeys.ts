import type { Key } from "ink"
import { charKey, namedKey, type KeyPress } from "./events.js"

export type InkKeyFlags = Pick<
  Key,
  | "return"
  | "escape"
  | "backspace"
  | "delete"
  | "tab"
  | "shift"
  | "ctrl"
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
>

/**
 * Translates one Ink `useInput` callback into key presses. Pasted text arrives
 * as a single chunk and is split into one press per character.
 */
export const fromInkInput = (input: string, key: InkKeyFlags): KeyPress[] => {
  if (key.return) return [namedKey("enter")]
  if (key.escape) return [namedKey("escape")]
  // Most terminals send DEL for Backspace, which Ink reports as `delete`.
  if (key.backspace || key.delete) return [namedKey("backspace")]
  if (key.tab) return [namedKey(key.shift ? "backTab" : "tab")]
  if (key.upArrow) return [namedKey("up")]
  if (key.downArrow) return [namedKey("down")]
  if (key.leftArrow) return [namedKey("left")]
  if (key.rightArrow) return [namedKey("right")]
  if (key.pageUp) return [namedKey("pageUp")]
  if (key.pageDown) return [namedKey("pageDown")]
  if (!input) return []
  if (key.ctrl) return [charKey(input, true)]
  return Array.from(input)
    .filter((char) => char >= " " && char !== "\u007f")
    .map((char) => charKey(char))
}
