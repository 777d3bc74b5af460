/**
 * CLI output formatting utilities
 *
 * Aligned text tables and the JSON envelope shared by every command.
 */

/**
 * Format a table from an array of row objects.
 *
 * Computes column widths from headers + data, then renders aligned columns
 * separated by ` | ` with a header separator row.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Array of row objects (values indexed by key)
 * @param keys    - Object keys to read from each row (in column order)
 */
export function formatTable(headers: string[], rows: Record<string, string>[], keys: string[]): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => Math.max(max, (row[key] ?? '').length), 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')
  const dataRows = rows.map((row) =>
    keys
      .map((key, i) => {
        const val = row[key] ?? ''
        return val.padEnd(widths[i] ?? val.length)
      })
      .join(' | ')
      .trimEnd(),
  )

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n')
}

/** Envelope for machine-consumable JSON output */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  version: string
  /** The CLI command that was executed */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}
