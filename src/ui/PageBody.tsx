import React from "react"
import { Box, Text } from "ink"
import type { SearchSnapshot } from "../session/pagerSession.js"
import { highlightLine, matchesByLine } from "./highlight.js"
import type { PagerTheme } from "./theme.js"

export interface PageBodyProps {
  readonly lines: ReadonlyArray<string>
  readonly scroll: number
  readonly height: number
  readonly search: SearchSnapshot | null
  readonly theme: PagerTheme
}

export const PageBody: React.FC<PageBodyProps> = ({ lines, scroll, height, search, theme }) => {
  const rows = Math.max(0, height)
  const start = Math.max(0, Math.min(scroll, lines.length))
  const visible = lines.slice(start, start + rows)
  const padded = visible.length < rows ? [...visible, ...Array<string>(rows - visible.length).fill("")] : visible
  const grouped = search ? matchesByLine(search.matches) : null
  const current = search && search.index !== null ? (search.matches[search.index] ?? null) : null

  return (
    <Box flexDirection="column" height={rows}>
      {padded.map((line, index) => {
        const absoluteLine = start + index
        const lineMatches = grouped?.get(absoluteLine) ?? []
        return (
          <Text key={`line-${absoluteLine}`} wrap="truncate-end">
            {line.length === 0 ? " " : highlightLine(line, lineMatches, current, theme)}
          </Text>
        )
      })}
    </Box>
  )
}
