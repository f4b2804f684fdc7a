import React from "react"
import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Either, Option } from "effect"
import { render } from "ink"
import type { Instance as InkInstance } from "ink"
import { loadAppConfig, type AppConfig } from "../config/appConfig.js"
import type { KeyPress } from "../input/events.js"
import { mapEvent, mapKey } from "../input/keymap.js"
import { createDebugLog, noopDebugLog, type DebugLog } from "../logging/debugLog.js"
import { createManClassifier, type ArgsClassifier } from "../render/classifyArgs.js"
import { SystemManRenderer } from "../render/systemRenderer.js"
import type { ManRenderer, RenderFault } from "../render/types.js"
import type { Intent } from "../session/intents.js"
import { PagerSession } from "../session/pagerSession.js"
import { createTerminalSession, installTerminalCleanup } from "../terminal/terminalSession.js"
import { contentHeight, contentWidth, measureTerminal, type TerminalSize } from "../ui/layout.js"
import { PagerApp } from "../ui/PagerApp.js"
import { createTheme, type PagerTheme } from "../ui/theme.js"

export const CLI_VERSION = "0.1.0"

export interface PagerRunOptions {
  readonly pages: ReadonlyArray<string>
  readonly config: AppConfig
  readonly stdout?: NodeJS.WriteStream
  readonly renderer?: ManRenderer
  readonly classify?: ArgsClassifier
}

interface InteractiveContext {
  readonly session: PagerSession
  readonly renderer: ManRenderer
  readonly theme: PagerTheme
  readonly stdout: NodeJS.WriteStream
  readonly log: DebugLog
}

const runInteractive = async ({ session, renderer, theme, stdout, log }: InteractiveContext): Promise<void> => {
  let size: TerminalSize = measureTerminal(stdout)
  let ink: InkInstance | null = null
  const outcome: { fatal: RenderFault | null; finished: boolean } = { fatal: null, finished: false }

  const finish = () => {
    outcome.finished = true
    ink?.unmount()
  }

  const dispatch = (intent: Intent): void => {
    if (outcome.finished) return
    const result = session.apply(intent, renderer, contentWidth(size.columns), contentHeight(size.rows))
    if (Either.isLeft(result)) {
      log.write("fatal", { reason: result.left.message })
      outcome.fatal = result.left
      finish()
      return
    }
    if (result.right === "terminate") finish()
  }

  const handleKeys = (keys: ReadonlyArray<KeyPress>) => {
    for (const key of keys) {
      const intent = mapKey(key, session.mode().kind)
      if (intent) dispatch(intent)
    }
  }

  const view = () => (
    <PagerApp snapshot={session.snapshot()} columns={size.columns} rows={size.rows} theme={theme} onKeys={handleKeys} />
  )

  const handleResize = () => {
    size = measureTerminal(stdout)
    const intent = mapEvent({ kind: "resize", width: size.columns, height: size.rows }, session.mode().kind)
    if (intent) dispatch(intent)
  }

  const instance = render(view(), { stdout, exitOnCtrlC: false })
  ink = instance
  const unsubscribe = session.onChange(() => {
    if (!outcome.finished) instance.rerender(view())
  })
  stdout.on("resize", handleResize)
  try {
    await instance.waitUntilExit()
  } finally {
    stdout.off("resize", handleResize)
    unsubscribe()
    instance.unmount()
  }
  if (outcome.fatal) throw outcome.fatal
}

export const runPager = async (options: PagerRunOptions): Promise<void> => {
  const { config } = options
  const stdout = options.stdout ?? process.stdout
  const log = config.debugLogPath ? createDebugLog(config.debugLogPath) : noopDebugLog
  const renderer = options.renderer ?? new SystemManRenderer({ manBinary: config.manBinary, colBinary: config.colBinary })
  const classify = options.classify ?? createManClassifier({ manBinary: config.manBinary })
  const session = new PagerSession({ classify, log, renderFaultPolicy: config.renderFaultPolicy })
  const size = measureTerminal(stdout)
  log.write("start", { pages: options.pages.join(" "), columns: size.columns, rows: size.rows })

  try {
    const startup = session.openStartupArgs(options.pages, renderer, contentWidth(size.columns), contentHeight(size.rows))
    if (Either.isLeft(startup)) throw startup.left

    const terminal = createTerminalSession((chunk) => stdout.write(chunk), config.altScreen && Boolean(stdout.isTTY))
    const disposeCleanup = installTerminalCleanup(terminal)
    terminal.acquire()
    try {
      await runInteractive({ session, renderer, theme: createTheme(config.colorMode), stdout, log })
    } finally {
      terminal.release()
      disposeCleanup()
    }
  } finally {
    log.write("stop", { tabs: session.tabs().length })
    await log.close()
  }
}

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)))

const pagesArg = Args.text({ name: "page" }).pipe(Args.repeated)
const configOption = Options.text("config").pipe(Options.optional)
const debugLogOption = Options.text("debug-log").pipe(Options.optional)
const noAltScreenOption = Options.boolean("no-alt-screen")
const strictConfigOption = Options.boolean("strict-config")

export const pagerCommand = Command.make(
  "mantabs",
  {
    pages: pagesArg,
    config: configOption,
    debugLog: debugLogOption,
    noAltScreen: noAltScreenOption,
    strictConfig: strictConfigOption,
  },
  ({ pages, config, debugLog, noAltScreen, strictConfig }) =>
    Effect.try({
      try: () =>
        loadAppConfig({
          configPath: Option.getOrNull(config),
          debugLogPath: Option.getOrNull(debugLog),
          altScreen: noAltScreen ? false : null,
          strictConfig,
        }),
      catch: toError,
    }).pipe(
      Effect.tap(({ warnings }) => Effect.forEach(warnings, (warning) => Console.error(`mantabs: ${warning}`))),
      Effect.flatMap(({ config: appConfig }) =>
        Effect.tryPromise({ try: () => runPager({ pages, config: appConfig }), catch: toError }),
      ),
      Effect.catchAll((error) =>
        Console.error(`mantabs: ${error.message}`).pipe(
          Effect.andThen(
            Effect.sync(() => {
              process.exitCode = 1
            }),
          ),
        ),
      ),
    ),
)
