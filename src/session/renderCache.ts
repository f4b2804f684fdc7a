export interface RenderCache {
  /** Width the lines were produced at; 0 means never rendered. */
  readonly width: number
  readonly lines: ReadonlyArray<string>
}

export const emptyRenderCache = (): RenderCache => ({ width: 0, lines: [] })

export const clampRenderWidth = (width: number): number => {
  const whole = Number.isFinite(width) ? Math.floor(width) : 1
  return Math.max(1, whole)
}

export const isCacheValid = (cache: RenderCache, width: number): boolean =>
  cache.width === width && cache.lines.length > 0
