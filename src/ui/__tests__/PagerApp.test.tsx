import React from "react"
import stripAnsi from "strip-ansi"
import { Either } from "effect"
import { render } from "ink-testing-library"
import { describe, expect, it, vi } from "vitest"
import { charKey, namedKey, type KeyPress } from "../../input/events.js"
import { plainPages } from "../../render/classifyArgs.js"
import type { ManRenderer } from "../../render/types.js"
import { PagerSession, type SessionSnapshot } from "../../session/pagerSession.js"
import { PagerApp } from "../PagerApp.js"
import { createTheme } from "../theme.js"

const delay = (ms = 0) => new Promise((resolve) => setTimeout(resolve, ms))

const theme = createTheme("none")

const renderer: ManRenderer = {
  render: (name) => Either.right(Array.from({ length: 6 }, (_, index) => `${name} ${index}`)),
}

const openSnapshot = (...pages: string[]): SessionSnapshot => {
  const session = new PagerSession({ classify: (tokens) => Either.right(plainPages(tokens)) })
  session.openPages(pages, null, renderer, 60, 4)
  return session.snapshot()
}

const frameLines = (frame: string | undefined): string[] =>
  stripAnsi(frame ?? "")
    .split("\n")
    .map((line) => line.trimEnd())

interface StdinPatched {
  ref: () => void
  unref: () => void
  write: (data: string) => void
}

describe("PagerApp", () => {
  it("lays out tabs, the visible lines and the status line", () => {
    const { lastFrame, unmount } = render(
      <PagerApp snapshot={openSnapshot("ls", "cat")} columns={60} rows={6} theme={theme} onKeys={() => {}} />,
    )
    expect(frameLines(lastFrame())).toEqual([
      " 1:ls │ 2:cat",
      "cat 0",
      "cat 1",
      "cat 2",
      "cat 3",
      "cat  line 1/6  ? help",
    ])
    unmount()
  })

  it("shows the empty session hint", () => {
    const { lastFrame, unmount } = render(
      <PagerApp snapshot={openSnapshot()} columns={60} rows={4} theme={theme} onKeys={() => {}} />,
    )
    const lines = frameLines(lastFrame())
    expect(lines[0]).toBe(" mantabs")
    expect(lines[lines.length - 1]).toBe("No open pages. Type :man NAME to open one.")
    unmount()
  })

  it("replaces the page with help in help mode", () => {
    const snapshot: SessionSnapshot = { ...openSnapshot("ls"), mode: { kind: "help" } }
    const { lastFrame, unmount } = render(
      <PagerApp snapshot={snapshot} columns={60} rows={8} theme={theme} onKeys={() => {}} />,
    )
    const lines = frameLines(lastFrame())
    expect(lines[1]).toBe("Keys")
    expect(lines[lines.length - 1]).toBe("help")
    unmount()
  })

  it("forwards key presses", async () => {
    const received: KeyPress[][] = []
    const onKeys = vi.fn((keys: ReadonlyArray<KeyPress>) => {
      received.push([...keys])
    })
    const result = render(
      <PagerApp snapshot={openSnapshot("ls")} columns={60} rows={6} theme={theme} onKeys={onKeys} />,
    )
    const stdin = result.stdin as StdinPatched
    stdin.ref = () => stdin
    stdin.unref = () => stdin
    await delay()
    stdin.write("j")
    await delay()
    stdin.write("\r")
    await delay()
    expect(received).toEqual([[charKey("j")], [namedKey("enter")]])
    result.unmount()
  })
})
