export interface SearchMatch {
  readonly line: number
  /** UTF-16 offset of the first matched character. */
  readonly start: number
  /** Exclusive end offset. */
  readonly end: number
}

export interface SearchState {
  readonly query: string | null
  readonly matches: ReadonlyArray<SearchMatch>
  readonly index: number | null
}

export const emptySearchState = (): SearchState => ({ query: null, matches: [], index: null })

export const collectMatches = (lines: ReadonlyArray<string>, query: string): SearchMatch[] => {
  if (!query) return []
  const matches: SearchMatch[] = []
  lines.forEach((line, lineIndex) => {
    let offset = 0
    while (offset <= line.length) {
      const start = line.indexOf(query, offset)
      if (start === -1) break
      const end = start + query.length
      matches.push({ line: lineIndex, start, end })
      offset = end
    }
  })
  return matches
}

const firstIndexFrom = (matches: ReadonlyArray<SearchMatch>, startLine: number): number | null => {
  if (matches.length === 0) return null
  const found = matches.findIndex((entry) => entry.line >= startLine)
  return found === -1 ? 0 : found
}

/** Rescans `lines` for the state's query and picks the first match at or below `startLine`. */
export const refreshSearch = (state: SearchState, lines: ReadonlyArray<string>, startLine: number): SearchState => {
  if (!state.query) return emptySearchState()
  const matches = collectMatches(lines, state.query)
  return { query: state.query, matches, index: firstIndexFrom(matches, startLine) }
}

export const updateSearch = (
  state: SearchState,
  query: string | null,
  lines: ReadonlyArray<string>,
  startLine: number,
): SearchState => {
  if (!query) return emptySearchState()
  return refreshSearch({ ...state, query }, lines, startLine)
}

export type SearchDirection = 1 | -1

export const stepMatch = (state: SearchState, direction: SearchDirection): SearchState => {
  const count = state.matches.length
  if (count === 0) return state.index === null ? state : { ...state, index: null }
  const index = state.index === null ? 0 : (state.index + direction + count) % count
  return { ...state, index }
}

export const currentMatch = (state: SearchState): SearchMatch | null =>
  state.index === null ? null : (state.matches[state.index] ?? null)
