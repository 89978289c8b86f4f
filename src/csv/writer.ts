export type CsvValue = string | number;

/** Renders a header and rows as CSV text with `\n` line endings and a trailing newline. */
export function formatCsv<TColumn extends string>(
  header: readonly TColumn[],
  rows: readonly Record<TColumn, CsvValue>[],
): string {
  const lines = [header.map((column) => csvEscape(column)).join(',')];
  for (const row of rows) {
    lines.push(header.map((column) => csvEscape(String(row[column]))).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function csvEscape(value: string): string {
  const needsQuotes = value.includes(',') || value.includes('\n') || value.includes('"');
  const sanitized = value.replace(/\r?\n/g, ' ').replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
