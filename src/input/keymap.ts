import type { Intent } from "../session/intents.js"
import type { ModeKind } from "../session/mode.js"
import type { InputEvent, KeyPress } from "./events.js"

const NORMAL_CHARS: Readonly<Record<string, Intent>> = {
  q: { type: "quit" },
  j: { type: "scrollDown", amount: 1 },
  k: { type: "scrollUp", amount: 1 },
  " ": { type: "pageDown" },
  b: { type: "pageUp" },
  g: { type: "goTop" },
  G: { type: "goBottom" },
  h: { type: "tabLeft" },
  l: { type: "tabRight" },
  "?": { type: "enterHelp" },
  ":": { type: "enterCommandMode" },
  "/": { type: "enterSearchMode" },
  n: { type: "searchNext" },
  N: { type: "searchPrev" },
  u: { type: "searchClear" },
}

const NORMAL_CTRL_CHARS: Readonly<Record<string, Intent>> = {
  c: { type: "quit" },
  f: { type: "pageDown" },
  b: { type: "pageUp" },
  d: { type: "halfPageDown" },
  u: { type: "halfPageUp" },
}

const isCtrlC = (key: KeyPress): boolean => key.kind === "char" && key.ctrl && key.char.toLowerCase() === "c"

const mapNormalKey = (key: KeyPress): Intent | null => {
  switch (key.kind) {
    case "char":
      return (key.ctrl ? NORMAL_CTRL_CHARS[key.char.toLowerCase()] : NORMAL_CHARS[key.char]) ?? null
    case "escape":
      return { type: "quit" }
    case "down":
    case "enter":
      return { type: "scrollDown", amount: 1 }
    case "up":
      return { type: "scrollUp", amount: 1 }
    case "pageDown":
      return { type: "pageDown" }
    case "pageUp":
      return { type: "pageUp" }
    case "left":
    case "backTab":
      return { type: "tabLeft" }
    case "right":
    case "tab":
      return { type: "tabRight" }
    default:
      return null
  }
}

const mapHelpKey = (key: KeyPress): Intent | null => {
  if (isCtrlC(key)) return { type: "quit" }
  if (key.kind === "escape") return { type: "exitHelp" }
  if (key.kind === "char" && !key.ctrl && (key.char === "q" || key.char === "?")) return { type: "exitHelp" }
  return null
}

const mapCommandKey = (key: KeyPress): Intent | null => {
  if (isCtrlC(key)) return { type: "quit" }
  switch (key.kind) {
    case "char":
      return key.ctrl ? null : { type: "commandChar", value: key.char }
    case "backspace":
      return { type: "commandBackspace" }
    case "enter":
      return { type: "commandSubmit" }
    case "escape":
      return { type: "commandCancel" }
    default:
      return null
  }
}

const mapSearchKey = (key: KeyPress): Intent | null => {
  if (isCtrlC(key)) return { type: "quit" }
  switch (key.kind) {
    case "char":
      return key.ctrl ? null : { type: "searchChar", value: key.char }
    case "backspace":
      return { type: "searchBackspace" }
    case "enter":
      return { type: "searchSubmit" }
    case "escape":
      return { type: "searchCancel" }
    default:
      return null
  }
}

export const mapKey = (key: KeyPress, mode: ModeKind): Intent | null => {
  switch (mode) {
    case "normal":
      return mapNormalKey(key)
    case "help":
      return mapHelpKey(key)
    case "command":
      return mapCommandKey(key)
    case "search":
      return mapSearchKey(key)
  }
}

export const mapEvent = (event: InputEvent, mode: ModeKind): Intent | null => {
  switch (event.kind) {
    case "resize":
      return { type: "resize", width: event.width, height: event.height }
    case "key":
      return mapKey(event.key, mode)
    default:
      return null
  }
}
