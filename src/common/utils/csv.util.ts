export type CsvCell = string | number | boolean | Date | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

function formatCell(value: CsvCell): string {
  if (value === null || value === undefined) {
    return '';
  }

  const text = value instanceof Date ? value.toISOString() : String(value);

  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render rows as RFC 4180 CSV (CRLF line endings, quoted when needed)
 */
export function toCsv(header: readonly string[], rows: readonly CsvCell[][]): string {
  return [header, ...rows].map((row) => row.map(formatCell).join(',')).join('\r\n') + '\r\n';
}
