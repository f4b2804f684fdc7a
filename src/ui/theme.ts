import { Chalk, type ChalkInstance } from "chalk"

export type ColorMode = "color" | "none"

export const PAGER_COLORS = {
  accent: "#4da3ff",
  activeTabText: "#1a1a1e",
  inactiveTab: "#8c8c96",
  matchText: "#7CF2FF",
  matchBackground: "#1e293b",
  currentMatchText: "#1a1a1e",
  currentMatchBackground: "#facc15",
  error: "#ff4d6d",
  muted: "#64646e",
} as const

export interface PagerTheme {
  readonly mode: ColorMode
  readonly paint: ChalkInstance
  readonly activeTab: (text: string) => string
  readonly inactiveTab: (text: string) => string
  readonly match: (text: string) => string
  readonly currentMatch: (text: string) => string
  readonly error: (text: string) => string
  readonly muted: (text: string) => string
  readonly prompt: (text: string) => string
}

export const createTheme = (mode: ColorMode): PagerTheme => {
  const paint = new Chalk({ level: mode === "none" ? 0 : 3 })
  return {
    mode,
    paint,
    activeTab: (text) => paint.bgHex(PAGER_COLORS.accent).hex(PAGER_COLORS.activeTabText).bold(text),
    inactiveTab: (text) => paint.hex(PAGER_COLORS.inactiveTab)(text),
    match: (text) => paint.bgHex(PAGER_COLORS.matchBackground).hex(PAGER_COLORS.matchText)(text),
    currentMatch: (text) =>
      paint.bgHex(PAGER_COLORS.currentMatchBackground).hex(PAGER_COLORS.currentMatchText).bold(text),
    error: (text) => paint.hex(PAGER_COLORS.error)(text),
    muted: (text) => paint.hex(PAGER_COLORS.muted)(text),
    prompt: (text) => paint.hex(PAGER_COLORS.accent).bold(text),
  }
}

export const resolveColorMode = (configured?: ColorMode, env: NodeJS.ProcessEnv = process.env): ColorMode => {
  if (env.NO_COLOR) return "none"
  const raw = (env.MANTABS_COLOR ?? "").toLowerCase().trim()
  if (["0", "none", "off", "false"].includes(raw)) return "none"
  if (["1", "color", "on", "true"].includes(raw)) return "color"
  return configured ?? "color"
}
