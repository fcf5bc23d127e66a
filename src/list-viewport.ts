/**
 * List Viewport Utilities
 *
 * Windowing arithmetic for the entry list and the side pane: which rows fit
 * in the terminal and which slice of a long list is on screen, so that only
 * the visible rows are rendered.
 */

export interface TerminalSize {
  rows: number
  columns: number
}

export interface LayoutConfig {
  headerHeight: number
  statusHeight: number
  paddingHeight: number
  footerHeight: number
}

export interface ViewportWindow<T> {
  items: T[]
  /** Index of the first visible item */
  start: number
  /** Index after the last visible item */
  end: number
}

/**
 * Default layout: breadcrumb header, status bar, borders, key hints
 */
export const defaultLayoutConfig: LayoutConfig = {
  headerHeight: 2,
  statusHeight: 2,
  paddingHeight: 2,
  footerHeight: 1
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '')
}

/**
 * Calculate available rows for the entry list
 */
export function calculateAvailableRows(terminalSize: TerminalSize, config: LayoutConfig = defaultLayoutConfig): number {
  const totalReserved = config.headerHeight + config.statusHeight + config.paddingHeight + config.footerHeight
  return Math.max(3, terminalSize.rows - totalReserved)
}

/**
 * First visible index that keeps `cursor` on screen while moving the window
 * as little as possible from `previousStart`.
 */
export function windowStart(cursor: number | undefined, total: number, rows: number, previousStart = 0): number {
  if (total <= rows) return 0
  const maxStart = total - rows
  let start = Math.min(Math.max(0, previousStart), maxStart)
  if (cursor === undefined) return start

  if (cursor < start) start = cursor
  else if (cursor >= start + rows) start = cursor - rows + 1
  return Math.min(Math.max(0, start), maxStart)
}

export function visibleWindow<T>(
  items: T[],
  cursor: number | undefined,
  rows: number,
  previousStart = 0
): ViewportWindow<T> {
  const start = windowStart(cursor, items.length, rows, previousStart)
  const end = Math.min(items.length, start + rows)
  return { items: items.slice(start, end), start, end }
}

/**
 * Position indicator, e.g. `21-40 of 120`
 */
export function formatScrollInfo(start: number, end: number, total: number): string {
  if (total === 0) return ''
  return `${start + 1}-${end} of ${total}`
}

/**
 * Split text into display lines no wider than `columns`.
 */
export function wrapLines(text: string, columns: number): string[] {
  const width = Math.max(1, columns)
  const result: string[] = []
  for (const line of text.split('\n')) {
    const clean = stripAnsi(line)
    if (clean.length <= width) {
      result.push(line)
      continue
    }
    for (let i = 0; i < clean.length; i += width) {
      result.push(clean.slice(i, i + width))
    }
  }
  return result
}

/**
 * Lines of a scrolled pane. `scroll` is clamped so the last page stays full.
 */
export function paneSlice<T>(lines: T[], scroll: number, rows: number): { lines: T[]; scroll: number } {
  const maxScroll = Math.max(0, lines.length - rows)
  const clamped = Math.min(Math.max(0, scroll), maxScroll)
  return { lines: lines.slice(clamped, clamped + rows), scroll: clamped }
}

/**
 * Cut `text` to `width` columns, marking the cut with an ellipsis.
 */
export function truncateText(text: string, width: number): string {
  if (width <= 0) return ''
  if (text.length <= width) return text
  if (width === 1) return '…'
  return `${text.slice(0, width - 1)}…`
}

export interface RowColumns {
  name: string
  size: string
  modified: string
}

const SIZE_WIDTH = 10
const MODIFIED_WIDTH = 19
const GAP = 2

/**
 * Fit a listing row into `width` columns: name left, size right-aligned,
 * then the modification time. The time is dropped first when space runs out.
 */
export function layoutRow(row: RowColumns, width: number): RowColumns {
  const withModified = width - SIZE_WIDTH - MODIFIED_WIDTH - 2 * GAP
  const showModified = withModified >= 12
  const nameWidth = Math.max(1, showModified ? withModified : width - SIZE_WIDTH - GAP)

  return {
    name: truncateText(row.name, nameWidth).padEnd(nameWidth),
    size: row.size.padStart(SIZE_WIDTH),
    modified: showModified ? row.modified.padEnd(MODIFIED_WIDTH) : ''
  }
}
