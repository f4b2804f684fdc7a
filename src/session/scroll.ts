export const maxScroll = (lineCount: number, viewportHeight: number): number => {
  if (lineCount <= 0) return 0
  return Math.max(0, lineCount - Math.max(1, viewportHeight))
}

export const halfPage = (viewportHeight: number): number => Math.max(1, Math.floor(viewportHeight / 2))

export const clampScroll = (scroll: number, lineCount: number, viewportHeight: number): number =>
  Math.max(0, Math.min(scroll, maxScroll(lineCount, viewportHeight)))

/** Scroll offset that puts `line` in the middle of the viewport when the page is tall enough. */
export const centerScroll = (line: number, lineCount: number, viewportHeight: number): number => {
  const desired = Math.max(0, line - Math.floor(viewportHeight / 2))
  return Math.min(desired, maxScroll(lineCount, viewportHeight))
}
