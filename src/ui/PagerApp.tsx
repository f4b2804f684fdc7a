import React from "react"
import { Box, useInput } from "ink"
import { fromInkInput } from "../input/inkKeys.js"
import type { KeyPress } from "../input/events.js"
import { EMPTY_SESSION_TITLE, type SessionSnapshot } from "../session/pagerSession.js"
import { HelpView } from "./HelpView.js"
import { contentHeight } from "./layout.js"
import { PageBody } from "./PageBody.js"
import { StatusLine } from "./StatusLine.js"
import { TabBar } from "./TabBar.js"
import type { PagerTheme } from "./theme.js"

export interface PagerAppProps {
  readonly snapshot: SessionSnapshot
  readonly columns: number
  readonly rows: number
  readonly theme: PagerTheme
  readonly onKeys: (keys: ReadonlyArray<KeyPress>) => void
}

export const PagerApp: React.FC<PagerAppProps> = ({ snapshot, columns, rows, theme, onKeys }) => {
  useInput((input, key) => {
    const keys = fromInkInput(input, key)
    if (keys.length > 0) onKeys(keys)
  })

  const bodyHeight = contentHeight(rows)
  return (
    <Box flexDirection="column" width={columns} height={rows}>
      <TabBar titles={snapshot.tabTitles} activeIndex={snapshot.activeIndex} emptyLabel={EMPTY_SESSION_TITLE} theme={theme} />
      {snapshot.mode.kind === "help" ? (
        <HelpView height={bodyHeight} theme={theme} />
      ) : (
        <PageBody
          lines={snapshot.lines}
          scroll={snapshot.scroll}
          height={bodyHeight}
          search={snapshot.search}
          theme={theme}
        />
      )}
      <StatusLine snapshot={snapshot} theme={theme} />
    </Box>
  )
}
