export const ALT_SCREEN_ENTER = "\u001b[?1049h"
export const ALT_SCREEN_EXIT = "\u001b[?1049l"
export const CURSOR_SHOW = "\u001b[?25h"

export type TerminalWriter = (chunk: string) => void

export interface TerminalSession {
  readonly enabled: boolean
  isActive(): boolean
  acquire(): void
  release(): void
}

export const createTerminalSession = (writer: TerminalWriter, enabled: boolean): TerminalSession => {
  let active = false
  return {
    enabled,
    isActive: () => active,
    acquire: () => {
      if (!enabled || active) return
      writer(ALT_SCREEN_ENTER)
      active = true
    },
    release: () => {
      if (!active) return
      active = false
      writer(`${ALT_SCREEN_EXIT}${CURSOR_SHOW}`)
    },
  }
}

const SIGNALS: ReadonlyArray<NodeJS.Signals> = ["SIGINT", "SIGTERM", "SIGHUP"]

export interface CleanupTarget {
  on(event: string, listener: () => void): unknown
  removeListener(event: string, listener: () => void): unknown
  exit(code?: number): void
}

/**
 * Leaves the alternate screen on process exit and on termination signals.
 * Returns a disposer that removes the handlers again.
 */
export const installTerminalCleanup = (session: TerminalSession, target: CleanupTarget = process): (() => void) => {
  const handleExit = () => session.release()
  const handleSignal = () => {
    session.release()
    target.exit(130)
  }
  target.on("exit", handleExit)
  for (const signal of SIGNALS) {
    target.on(signal, handleSignal)
  }
  return () => {
    target.removeListener("exit", handleExit)
    for (const signal of SIGNALS) {
      target.removeListener(signal, handleSignal)
    }
  }
}
