/**
 * Consistent CLI output helpers.
 *
 * All output uses process.stdout/stderr.write for testability.
 * No colors, no emojis -- clean text output only.
 */
export const output = {
  /** Write an informational message to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a success message to stdout, prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a warning message to stderr, prefixed with "Warning:". */
  warn(message: string): void {
    process.stderr.write('Warning: ' + message + '\n')
  },

  /**
   * Write rows under a header, columns padded to their widest cell.
   * Columns are positional, so repeated column names stay distinct.
   */
  table(columns: string[], rows: string[][]): void {
    const widths = columns.map((name, i) =>
      Math.max(name.length, ...rows.map((row) => (row[i] ?? '').length)),
    )
    const render = (cells: string[]): string =>
      widths.map((w, i) => (cells[i] ?? '').padEnd(w)).join('  ').trimEnd()

    process.stdout.write(render(columns) + '\n')
    process.stdout.write(widths.map((w) => '-'.repeat(w)).join('  ') + '\n')
    for (const row of rows) {
      process.stdout.write(render(row) + '\n')
    }
  },
}
