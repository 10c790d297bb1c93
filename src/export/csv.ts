/**
 * CSV Export
 *
 * Serialize flat rows to CSV in a fixed column order.
 */

/**
 * Escape a value for CSV (handle quotes and commas).
 */
export function escapeCSV(value: string | number | undefined | null): string {
  if (value === undefined || value === null) {
    return ''
  }

  const str = String(value)

  // If contains comma, newline, or quote, wrap in quotes
  if (str.includes(',') || str.includes('\n') || str.includes('"') || str.includes('\r')) {
    // Double any existing quotes
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Export rows to CSV: header row, then one line per row with every column, in column order.
 */
export function exportToCSV<C extends string>(
  columns: readonly C[],
  rows: readonly Readonly<Record<C, string>>[]
): string {
  const lines = [columns.map(escapeCSV).join(',')]

  for (const row of rows) {
    lines.push(columns.map((column) => escapeCSV(row[column])).join(','))
  }

  return `${lines.join('\n')}\n`
}
