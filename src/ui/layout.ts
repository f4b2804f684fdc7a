/** Rows taken by the tab bar and the status line. */
export const CHROME_ROWS = 2

export const contentHeight = (rows: number): number => Math.max(0, Math.floor(rows) - CHROME_ROWS)

export const contentWidth = (columns: number): number => Math.max(1, Math.floor(columns) || 1)

export interface TerminalSize {
  readonly columns: number
  readonly rows: number
}

const DEFAULT_SIZE: TerminalSize = { columns: 80, rows: 24 }

export const measureTerminal = (stream: { columns?: number; rows?: number }): TerminalSize => ({
  columns: stream.columns && stream.columns > 0 ? stream.columns : DEFAULT_SIZE.columns,
  rows: stream.rows && stream.rows > 0 ? stream.rows : DEFAULT_SIZE.rows,
})
