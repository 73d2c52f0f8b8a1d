/**
 * TableFormatter
 *
 * Renders row-major cell grids as Markdown and CSV.
 * Provides static utility methods for conversion.
 */
export class TableFormatter {
  /**
   * Convert rows to a Markdown table. The first row is the header; shorter
   * rows are padded to the widest row.
   *
   * @example
   * Output:
   * | Region | 2023 | 2024 |
   * | --- | --- | --- |
   * | Asia | 4.1 | 4.4 |
   */
  static toMarkdown(rows: readonly string[][]): string {
    if (rows.length === 0) {
      return '';
    }

    const width = TableFormatter.maxColumns(rows);
    const line = (cells: string[]) => `| ${cells.join(' | ')} |`;
    const padded = rows.map((row) =>
      TableFormatter.pad(row, width).map(TableFormatter.escapeTableCell),
    );

    return [
      line(padded[0]),
      line(Array.from({ length: width }, () => '---')),
      ...padded.slice(1).map(line),
    ].join('\n');
  }

  /**
   * Convert rows to RFC 4180 CSV with CRLF line endings.
   */
  static toCsv(rows: readonly string[][]): string {
    return rows
      .map((row) => `${row.map(TableFormatter.escapeCsvField).join(',')}\r\n`)
      .join('');
  }

  static maxColumns(rows: readonly string[][]): number {
    return rows.reduce((max, row) => Math.max(max, row.length), 0);
  }

  private static pad(row: string[], width: number): string[] {
    return [...row, ...Array.from({ length: width - row.length }, () => '')];
  }

  private static escapeTableCell(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ').trim();
  }

  private static escapeCsvField(field: string): string {
    return /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
  }
}
