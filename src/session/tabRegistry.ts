import { Either } from "effect"
import { noopDebugLog, type DebugLog } from "../logging/debugLog.js"
import { isRecoverable, type ManRenderer, type RenderError, type RenderFault } from "../render/types.js"
import { PagerDocument } from "./document.js"
import { clampScroll, maxScroll } from "./scroll.js"

export type CycleDirection = "left" | "right"

export interface OpenBatchResult {
  readonly opened: number
  /** Message of the last page in the batch that could not be found. */
  readonly lastError: string | null
}

export class TabRegistry {
  private readonly documents: PagerDocument[] = []
  private active = 0

  constructor(private readonly log: DebugLog = noopDebugLog) {}

  tabs(): ReadonlyArray<PagerDocument> {
    return this.documents
  }

  isEmpty(): boolean {
    return this.documents.length === 0
  }

  activeIndex(): number {
    return this.active
  }

  activeDocument(): PagerDocument | null {
    return this.documents[this.active] ?? null
  }

  maxScroll(viewportHeight: number): number {
    const page = this.activeDocument()
    return page ? maxScroll(page.lineCount(), viewportHeight) : 0
  }

  clampActiveScroll(viewportHeight: number): void {
    const page = this.activeDocument()
    if (!page) return
    page.scrollTo(clampScroll(page.scroll, page.lineCount(), viewportHeight))
  }

  /**
   * Opens each page as a new active tab. Pages that cannot be found are dropped
   * and the batch continues; a renderer fault drops the page and stops the batch.
   */
  open(
    names: ReadonlyArray<string>,
    category: string | null,
    renderer: ManRenderer,
    width: number,
    viewportHeight: number,
  ): Either.Either<OpenBatchResult, RenderFault> {
    let lastError: string | null = null
    let opened = 0
    for (const name of names) {
      const page = new PagerDocument(name, category)
      this.documents.push(page)
      this.active = this.documents.length - 1
      const rendered = page.ensureRender(renderer, width)
      if (Either.isLeft(rendered)) {
        this.removeActive()
        const error = rendered.left
        this.log.write("open_failed", { name, category, reason: error.message, recoverable: isRecoverable(error) })
        if (!isRecoverable(error)) return Either.left(error)
        lastError = error.message
        continue
      }
      opened += 1
      this.log.write("open", { name, category, tabs: this.documents.length })
    }
    this.clampActiveScroll(viewportHeight)
    return Either.right({ opened, lastError })
  }

  closeActive(renderer: ManRenderer, width: number, viewportHeight: number): Either.Either<void, RenderError> {
    if (this.documents.length === 0) return Either.right(undefined)
    const closed = this.documents[this.active]
    this.removeActive()
    this.log.write("close", { name: closed?.name ?? null, tabs: this.documents.length })
    return this.renderActive(renderer, width, viewportHeight)
  }

  cycle(
    direction: CycleDirection,
    renderer: ManRenderer,
    width: number,
    viewportHeight: number,
  ): Either.Either<void, RenderError> {
    const count = this.documents.length
    if (count === 0) return Either.right(undefined)
    this.active = direction === "left" ? (this.active - 1 + count) % count : (this.active + 1) % count
    return this.renderActive(renderer, width, viewportHeight)
  }

  renderActive(renderer: ManRenderer, width: number, viewportHeight: number): Either.Either<void, RenderError> {
    const page = this.activeDocument()
    if (!page) return Either.right(undefined)
    const rendered = page.ensureRender(renderer, width)
    if (Either.isLeft(rendered)) return rendered
    this.clampActiveScroll(viewportHeight)
    return Either.right(undefined)
  }

  private removeActive(): void {
    this.documents.splice(this.active, 1)
    if (this.documents.length === 0) {
      this.active = 0
    } else if (this.active >= this.documents.length) {
      this.active = this.documents.length - 1
    }
  }
}
