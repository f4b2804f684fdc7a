import React from "react"
import { Box, Text } from "ink"
import { COMMAND_SUMMARY } from "../session/commandParser.js"
import type { PagerTheme } from "./theme.js"

const KEY_HELP: ReadonlyArray<readonly [string, string]> = [
  ["j / k, ↓ / ↑", "Scroll one line"],
  ["Space / b, PgDn / PgUp", "Scroll one page"],
  ["Ctrl+D / Ctrl+U", "Scroll half a page"],
  ["g / G", "Jump to top / bottom"],
  ["h / l, ← / →, Tab", "Previous / next tab"],
  ["/", "Search (results update as you type)"],
  ["n / N", "Next / previous match"],
  ["u", "Clear the search"],
  [":", "Enter a command"],
  ["?", "Toggle this help"],
  ["q, Esc", "Quit"],
]

export interface HelpViewProps {
  readonly height: number
  readonly theme: PagerTheme
}

export const helpLines = (theme: PagerTheme): string[] => {
  const keyWidth = Math.max(...KEY_HELP.map(([keys]) => keys.length))
  const usageWidth = Math.max(...COMMAND_SUMMARY.map((entry) => entry.usage.length))
  return [
    theme.prompt("Keys"),
    ...KEY_HELP.map(([keys, summary]) => `  ${keys.padEnd(keyWidth)}  ${summary}`),
    "",
    theme.prompt("Commands"),
    ...COMMAND_SUMMARY.map((entry) => `  :${entry.usage.padEnd(usageWidth)}  ${entry.summary}`),
    "",
    theme.muted("Press q, ? or Esc to close."),
  ]
}

export const HelpView: React.FC<HelpViewProps> = ({ height, theme }) => (
  <Box flexDirection="column" height={Math.max(0, height)} overflow="hidden">
    {helpLines(theme)
      .slice(0, Math.max(0, height))
      .map((line, index) => (
        <Text key={`help-${index}`} wrap="truncate-end">
          {line.length === 0 ? " " : line}
        </Text>
      ))}
  </Box>
)
