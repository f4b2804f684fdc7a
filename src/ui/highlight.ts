import type { SearchMatch } from "../session/search.js"
import type { PagerTheme } from "./theme.js"

export const matchesByLine = (matches: ReadonlyArray<SearchMatch>): Map<number, SearchMatch[]> => {
  const grouped = new Map<number, SearchMatch[]>()
  for (const entry of matches) {
    const bucket = grouped.get(entry.line)
    if (bucket) {
      bucket.push(entry)
    } else {
      grouped.set(entry.line, [entry])
    }
  }
  return grouped
}

export const highlightLine = (
  line: string,
  matches: ReadonlyArray<SearchMatch>,
  current: SearchMatch | null,
  theme: PagerTheme,
): string => {
  if (matches.length === 0) return line
  let out = ""
  let cursor = 0
  for (const entry of matches) {
    if (entry.start < cursor) continue
    out += line.slice(cursor, entry.start)
    const text = line.slice(entry.start, entry.end)
    const isCurrent = current !== null && current.line === entry.line && current.start === entry.start
    out += isCurrent ? theme.currentMatch(text) : theme.match(text)
    cursor = entry.end
  }
  return out + line.slice(cursor)
}
