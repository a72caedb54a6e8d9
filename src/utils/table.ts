/**
 * Plain-text tables for terminal output
 */

export function tabulate(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );
  const format = (cells: string[]): string =>
    widths
      .map((width, column) => (cells[column] ?? '').padEnd(width))
      .join(' | ')
      .trimEnd();

  return [
    format(headers),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...rows.map(format),
  ].join('\n');
}
