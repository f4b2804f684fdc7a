import React from "react"
import { Text } from "ink"
import type { PagerTheme } from "./theme.js"

export interface TabBarProps {
  readonly titles: ReadonlyArray<string>
  readonly activeIndex: number
  readonly emptyLabel: string
  readonly theme: PagerTheme
}

export const formatTabBar = (titles: ReadonlyArray<string>, activeIndex: number, theme: PagerTheme): string =>
  titles
    .map((title, index) => {
      const label = ` ${index + 1}:${title} `
      return index === activeIndex ? theme.activeTab(label) : theme.inactiveTab(label)
    })
    .join(theme.muted("│"))

export const TabBar: React.FC<TabBarProps> = ({ titles, activeIndex, emptyLabel, theme }) => (
  <Text wrap="truncate-end">
    {titles.length === 0 ? theme.muted(` ${emptyLabel} `) : formatTabBar(titles, activeIndex, theme)}
  </Text>
)
