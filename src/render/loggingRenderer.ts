import { Either } from "effect"
import type { DebugLog } from "../logging/debugLog.js"
import type { ManRenderer } from "./types.js"

export const withRenderLogging = (renderer: ManRenderer, log: DebugLog): ManRenderer => {
  if (!log.enabled) return renderer
  return {
    render: (name, category, width) => {
      const startedAt = Date.now()
      const result = renderer.render(name, category, width)
      const elapsedMs = Date.now() - startedAt
      if (Either.isLeft(result)) {
        log.write("render_failed", { name, category, width, elapsedMs, kind: result.left._tag, reason: result.left.message })
      } else {
        log.write("render", { name, category, width, elapsedMs, lines: result.right.length })
      }
      return result
    },
  }
}
