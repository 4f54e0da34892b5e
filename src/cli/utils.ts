/**
 * CLI Output Formatting
 *
 * Plain-text helpers for tables, sizes and numbers.
 */

import { BYTES_PER_KB } from '../constants'

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B'

  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(BYTES_PER_KB)), units.length - 1)
  const value = bytes / Math.pow(BYTES_PER_KB, i)

  return `${value.toFixed(i === 0 ? 0 : 1)} ${units[i] ?? 'B'}`
}

/**
 * Format an optional measurement; unmeasured values print as "-"
 */
export function formatValue(value: number | null | undefined, decimals = 2): string {
  return value === null || value === undefined ? '-' : value.toFixed(decimals)
}

/**
 * Format a signed percentage change, e.g. "+30.0%"
 */
export function formatChange(changePercent: number, decimals = 1): string {
  const sign = changePercent > 0 ? '+' : ''
  return `${sign}${changePercent.toFixed(decimals)}%`
}

/**
 * Create a simple ASCII table from data
 */
export function simpleTable(
  headers: string[],
  rows: (string | number)[][],
  options: { padding?: number | undefined } = {}
): string {
  const { padding = 2 } = options
  const gap = ' '.repeat(padding)

  const widths = headers.map((h, i) => {
    const cellWidths = rows.map(row => String(row[i] ?? '').length)
    return Math.max(h.length, ...cellWidths)
  })

  const renderRow = (cells: (string | number)[]): string =>
    widths
      .map((width, i) => String(cells[i] ?? '').padEnd(width))
      .join(gap)
      .trimEnd()

  const separator = widths.map(w => '-'.repeat(w)).join(gap)

  return [renderRow(headers), separator, ...rows.map(renderRow)].join('\n')
}
