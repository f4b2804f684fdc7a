import React from "react"
import { Text } from "ink"
import type { SessionSnapshot } from "../session/pagerSession.js"
import type { PagerTheme } from "./theme.js"

export const EMPTY_SESSION_HINT = "No open pages. Type :man NAME to open one."

const searchSummary = (snapshot: SessionSnapshot): string | null => {
  const search = snapshot.search
  if (!search) return null
  const count = search.matches.length
  if (count === 0) return `/${search.query}  no matches`
  return `/${search.query}  ${(search.index ?? 0) + 1}/${count}`
}

export const formatStatusLine = (snapshot: SessionSnapshot, theme: PagerTheme): string => {
  const mode = snapshot.mode
  if (mode.kind === "command") return `${theme.prompt(":")}${mode.line}`
  if (mode.kind === "search") return `${theme.prompt("/")}${mode.line}`
  if (snapshot.statusMessage) return theme.error(snapshot.statusMessage)
  if (mode.kind === "help") return theme.muted("help")
  if (snapshot.tabTitles.length === 0) return theme.muted(EMPTY_SESSION_HINT)
  const total = snapshot.lines.length
  const position = total === 0 ? "empty" : `line ${snapshot.scroll + 1}/${total}`
  const parts = [snapshot.title, position]
  const search = searchSummary(snapshot)
  if (search) parts.push(search)
  return `${parts.join("  ")}  ${theme.muted("? help")}`
}

export interface StatusLineProps {
  readonly snapshot: SessionSnapshot
  readonly theme: PagerTheme
}

export const StatusLine: React.FC<StatusLineProps> = ({ snapshot, theme }) => (
  <Text wrap="truncate-end">{formatStatusLine(snapshot, theme)}</Text>
)
