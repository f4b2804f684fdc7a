import { Either } from "effect"
import { formatIdentity, type DocumentIdentity, type ManRenderer, type RenderError } from "../render/types.js"
import { clampRenderWidth, emptyRenderCache, isCacheValid, type RenderCache } from "./renderCache.js"
import {
  currentMatch,
  emptySearchState,
  refreshSearch,
  stepMatch,
  updateSearch,
  type SearchMatch,
  type SearchState,
} from "./search.js"

/** One opened page: its identity, cached rendering, scroll offset and search state. */
export class PagerDocument {
  readonly identity: DocumentIdentity
  private offset = 0
  private cache: RenderCache = emptyRenderCache()
  private search: SearchState = emptySearchState()

  constructor(name: string, category: string | null = null) {
    this.identity = { name, category }
  }

  get name(): string {
    return this.identity.name
  }

  get category(): string | null {
    return this.identity.category
  }

  get scroll(): number {
    return this.offset
  }

  /** Moves to `value`, kept within the rendered lines. */
  scrollTo(value: number): void {
    this.offset = value
    this.clampScroll()
  }

  title(): string {
    return formatIdentity(this.identity)
  }

  lines(): ReadonlyArray<string> {
    return this.cache.lines
  }

  lineCount(): number {
    return this.cache.lines.length
  }

  renderedWidth(): number {
    return this.cache.width
  }

  searchQuery(): string | null {
    return this.search.query
  }

  searchMatches(): ReadonlyArray<SearchMatch> {
    return this.search.matches
  }

  searchIndex(): number | null {
    return this.search.index
  }

  ensureRender(renderer: ManRenderer, width: number): Either.Either<void, RenderError> {
    const safeWidth = clampRenderWidth(width)
    if (!isCacheValid(this.cache, safeWidth)) {
      const rendered = renderer.render(this.identity.name, this.identity.category, safeWidth)
      if (Either.isLeft(rendered)) return Either.left(rendered.left)
      this.cache = { width: safeWidth, lines: rendered.right }
    }
    if (this.search.query) {
      this.search = refreshSearch(this.search, this.cache.lines, this.offset)
    }
    this.clampScroll()
    return Either.right(undefined)
  }

  clampScroll(): void {
    const last = Math.max(0, this.cache.lines.length - 1)
    if (this.offset > last) this.offset = last
    if (this.offset < 0) this.offset = 0
  }

  updateSearch(query: string | null, startLine: number): void {
    this.search = updateSearch(this.search, query, this.cache.lines, startLine)
  }

  clearSearch(): void {
    this.search = emptySearchState()
  }

  nextMatchLine(): number | null {
    this.search = stepMatch(this.search, 1)
    return this.currentMatchLine()
  }

  previousMatchLine(): number | null {
    this.search = stepMatch(this.search, -1)
    return this.currentMatchLine()
  }

  currentMatchLine(): number | null {
    return currentMatch(this.search)?.line ?? null
  }
}

/** Read-only view of an open page handed out beyond the session. */
export type DocumentView = Pick<PagerDocument, "identity" | "name" | "category" | "title" | "scroll" | "lineCount">
