export type CsvValue = string | number | null | undefined;

/**
 * Quotes a value when it contains a separator, a quote or a line break
 */
export function escapeCsv(value: CsvValue): string {
  if (value == null) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Serialises a header and rows to CSV with `\n` line endings and a trailing newline
 */
export function toCsv(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  const lines = [header, ...rows].map((row) => row.map(escapeCsv).join(','));
  return lines.join('\n') + '\n';
}
