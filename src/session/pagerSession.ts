import { EventEmitter } from "node:events"
import { Either } from "effect"
import { noopDebugLog, type DebugLog } from "../logging/debugLog.js"
import type { ArgsClassifier } from "../render/classifyArgs.js"
import { withRenderLogging } from "../render/loggingRenderer.js"
import { isRecoverable, type ManRenderer, type RenderError, type RenderFault } from "../render/types.js"
import { parseCommand, resolveOpenRequest, type ParsedCommand } from "./commandParser.js"
import type { DocumentView } from "./document.js"
import { keepsStatusMessage, type Intent } from "./intents.js"
import { appendToLine, commandMode, HELP_MODE, NORMAL_MODE, popFromLine, searchMode, type Mode } from "./mode.js"
import { centerScroll, halfPage } from "./scroll.js"
import type { SearchMatch } from "./search.js"
import { TabRegistry } from "./tabRegistry.js"

export type UpdateOutcome = "continue" | "terminate"

export type UpdateResult = Either.Either<UpdateOutcome, RenderFault>

/**
 * What happens when the renderer itself breaks while `:man` opens pages.
 * `terminate` lets the fault escape `apply`; `status` reports it and keeps the session.
 */
export type RenderFaultPolicy = "terminate" | "status"

export const EMPTY_SESSION_TITLE = "mantabs"

export interface PagerSessionOptions {
  readonly classify: ArgsClassifier
  readonly log?: DebugLog
  readonly renderFaultPolicy?: RenderFaultPolicy
}

export interface SearchSnapshot {
  readonly query: string
  readonly matches: ReadonlyArray<SearchMatch>
  readonly index: number | null
}

export interface SessionSnapshot {
  readonly title: string
  readonly tabTitles: ReadonlyArray<string>
  readonly activeIndex: number
  readonly lines: ReadonlyArray<string>
  readonly scroll: number
  readonly mode: Mode
  readonly statusMessage: string | null
  readonly search: SearchSnapshot | null
}

type SnapshotListener = (snapshot: SessionSnapshot) => void

const CONTINUE: UpdateResult = Either.right<UpdateOutcome>("continue")
const TERMINATE: UpdateResult = Either.right<UpdateOutcome>("terminate")

export class PagerSession extends EventEmitter {
  private readonly registry: TabRegistry
  private readonly classify: ArgsClassifier
  private readonly log: DebugLog
  private readonly renderFaultPolicy: RenderFaultPolicy
  private currentMode: Mode = NORMAL_MODE
  private status: string | null = null

  constructor(options: PagerSessionOptions) {
    super()
    this.classify = options.classify
    this.log = options.log ?? noopDebugLog
    this.renderFaultPolicy = options.renderFaultPolicy ?? "terminate"
    this.registry = new TabRegistry(this.log)
  }

  hasTabs(): boolean {
    return !this.registry.isEmpty()
  }

  tabs(): ReadonlyArray<DocumentView> {
    return this.registry.tabs()
  }

  activeIndex(): number {
    return this.registry.activeIndex()
  }

  title(): string {
    return this.registry.activeDocument()?.title() ?? EMPTY_SESSION_TITLE
  }

  lines(): ReadonlyArray<string> {
    return this.registry.activeDocument()?.lines() ?? []
  }

  scroll(): number {
    return this.registry.activeDocument()?.scroll ?? 0
  }

  mode(): Mode {
    return this.currentMode
  }

  statusMessage(): string | null {
    return this.status
  }

  searchQuery(): string | null {
    return this.registry.activeDocument()?.searchQuery() ?? null
  }

  searchMatches(): ReadonlyArray<SearchMatch> {
    return this.registry.activeDocument()?.searchMatches() ?? []
  }

  currentMatchIndex(): number | null {
    return this.registry.activeDocument()?.searchIndex() ?? null
  }

  snapshot(): SessionSnapshot {
    const page = this.registry.activeDocument()
    const query = page?.searchQuery() ?? null
    return {
      title: this.title(),
      tabTitles: this.registry.tabs().map((tab) => tab.title()),
      activeIndex: this.registry.activeIndex(),
      lines: page?.lines() ?? [],
      scroll: page?.scroll ?? 0,
      mode: this.currentMode,
      statusMessage: this.status,
      search: page && query ? { query, matches: page.searchMatches(), index: page.searchIndex() } : null,
    }
  }

  onChange(listener: SnapshotListener): () => void {
    this.on("change", listener)
    listener(this.snapshot())
    return () => this.off("change", listener)
  }

  /** Opens a batch of pages; missing pages become the status message, faults are returned. */
  openPages(
    pages: ReadonlyArray<string>,
    category: string | null,
    renderer: ManRenderer,
    width: number,
    viewportHeight: number,
  ): Either.Either<void, RenderFault> {
    const opened = this.registry.open(pages, category, withRenderLogging(renderer, this.log), width, viewportHeight)
    if (Either.isRight(opened) && opened.right.lastError) {
      this.status = opened.right.lastError
    }
    this.emitChange()
    return Either.map(opened, () => undefined)
  }

  openStartupArgs(
    tokens: ReadonlyArray<string>,
    renderer: ManRenderer,
    width: number,
    viewportHeight: number,
  ): Either.Either<void, RenderFault> {
    const request = resolveOpenRequest(tokens, this.classify)
    if (request.pages.length === 0) return Either.right(undefined)
    return this.openPages(request.pages, request.category, renderer, width, viewportHeight)
  }

  apply(intent: Intent, renderer: ManRenderer, width: number, viewportHeight: number): UpdateResult {
    if (this.status !== null && !keepsStatusMessage(intent)) {
      this.status = null
    }
    const result = this.dispatch(intent, withRenderLogging(renderer, this.log), width, viewportHeight)
    this.emitChange()
    return result
  }

  private dispatch(intent: Intent, renderer: ManRenderer, width: number, viewportHeight: number): UpdateResult {
    switch (intent.type) {
      case "quit":
        return TERMINATE
      case "scrollUp":
        this.scrollUp(intent.amount)
        return CONTINUE
      case "scrollDown":
        this.scrollDown(intent.amount, viewportHeight)
        return CONTINUE
      case "pageUp":
        this.scrollUp(viewportHeight)
        return CONTINUE
      case "pageDown":
        this.scrollDown(viewportHeight, viewportHeight)
        return CONTINUE
      case "halfPageUp":
        this.scrollUp(halfPage(viewportHeight))
        return CONTINUE
      case "halfPageDown":
        this.scrollDown(halfPage(viewportHeight), viewportHeight)
        return CONTINUE
      case "resize":
        return this.proceed(this.registry.renderActive(renderer, width, viewportHeight))
      case "goTop":
        this.setScroll(0)
        return CONTINUE
      case "goBottom":
        this.setScroll(this.registry.maxScroll(viewportHeight))
        return CONTINUE
      case "tabLeft":
        return this.proceed(this.registry.cycle("left", renderer, width, viewportHeight))
      case "tabRight":
        return this.proceed(this.registry.cycle("right", renderer, width, viewportHeight))
      case "enterHelp":
        this.currentMode = HELP_MODE
        return CONTINUE
      case "exitHelp":
        this.currentMode = NORMAL_MODE
        return CONTINUE
      case "enterCommandMode":
        this.currentMode = commandMode()
        return CONTINUE
      case "commandChar":
        if (this.currentMode.kind === "command") this.currentMode = appendToLine(this.currentMode, intent.value)
        return CONTINUE
      case "commandBackspace":
        if (this.currentMode.kind === "command") this.currentMode = popFromLine(this.currentMode)
        return CONTINUE
      case "commandCancel":
        this.currentMode = NORMAL_MODE
        return CONTINUE
      case "commandSubmit": {
        const line = this.currentMode.kind === "command" ? this.currentMode.line : ""
        this.currentMode = NORMAL_MODE
        const command = parseCommand(line, this.classify)
        this.log.write("command", { line, kind: command.kind })
        return this.execute(command, renderer, width, viewportHeight)
      }
      case "enterSearchMode":
        this.enterSearchMode()
        return CONTINUE
      case "searchChar":
      case "searchBackspace": {
        const mode = this.currentMode
        if (mode.kind !== "search") return CONTINUE
        const next = intent.type === "searchChar" ? appendToLine(mode, intent.value) : popFromLine(mode)
        this.currentMode = next
        this.applySearch(next.kind === "search" ? next.line : "", viewportHeight)
        return CONTINUE
      }
      case "searchSubmit":
        if (this.currentMode.kind !== "search") return CONTINUE
        this.applySearch(this.currentMode.line, viewportHeight)
        this.currentMode = NORMAL_MODE
        return CONTINUE
      case "searchCancel":
        this.cancelSearch(viewportHeight)
        return CONTINUE
      case "searchNext":
        this.centerOn(this.registry.activeDocument()?.nextMatchLine() ?? null, viewportHeight)
        return CONTINUE
      case "searchPrev":
        this.centerOn(this.registry.activeDocument()?.previousMatchLine() ?? null, viewportHeight)
        return CONTINUE
      case "searchClear":
        this.registry.activeDocument()?.clearSearch()
        return CONTINUE
    }
  }

  private execute(command: ParsedCommand, renderer: ManRenderer, width: number, viewportHeight: number): UpdateResult {
    switch (command.kind) {
      case "man": {
        const opened = this.registry.open(command.pages, command.category, renderer, width, viewportHeight)
        if (Either.isLeft(opened)) {
          if (this.renderFaultPolicy === "terminate") return Either.left(opened.left)
          this.status = opened.left.message
          return CONTINUE
        }
        if (opened.right.lastError) this.status = opened.right.lastError
        return CONTINUE
      }
      case "help":
        this.currentMode = HELP_MODE
        return CONTINUE
      case "quit":
        return TERMINATE
      case "wipe":
        return this.proceed(this.registry.closeActive(renderer, width, viewportHeight))
      case "empty":
        return CONTINUE
      case "unknown":
        this.status = `Unknown command '${command.command}'`
        return CONTINUE
    }
  }

  private proceed(result: Either.Either<void, RenderError>): UpdateResult {
    if (Either.isRight(result)) return CONTINUE
    const error = result.left
    if (isRecoverable(error)) {
      this.status = error.message
      return CONTINUE
    }
    return Either.left(error)
  }

  private scrollUp(amount: number): void {
    const page = this.registry.activeDocument()
    if (!page) return
    page.scrollTo(Math.max(0, page.scroll - amount))
  }

  private scrollDown(amount: number, viewportHeight: number): void {
    const page = this.registry.activeDocument()
    if (!page) return
    page.scrollTo(Math.min(page.scroll + amount, this.registry.maxScroll(viewportHeight)))
  }

  private setScroll(value: number): void {
    const page = this.registry.activeDocument()
    page?.scrollTo(value)
  }

  private centerOn(line: number | null, viewportHeight: number): void {
    const page = this.registry.activeDocument()
    if (!page || line === null) return
    page.scrollTo(centerScroll(line, page.lineCount(), viewportHeight))
  }

  private enterSearchMode(): void {
    const page = this.registry.activeDocument()
    if (!page) return
    this.currentMode = searchMode(page.searchQuery())
  }

  private applySearch(query: string, viewportHeight: number): void {
    const page = this.registry.activeDocument()
    if (!page) return
    page.updateSearch(query, page.scroll)
    this.centerOn(page.currentMatchLine(), viewportHeight)
  }

  private cancelSearch(viewportHeight: number): void {
    const mode = this.currentMode
    if (mode.kind !== "search") return
    if (mode.previous !== null) {
      this.applySearch(mode.previous, viewportHeight)
    } else {
      this.registry.activeDocument()?.clearSearch()
    }
    this.currentMode = NORMAL_MODE
  }

  private emitChange(): void {
    this.emit("change", this.snapshot())
  }
}
