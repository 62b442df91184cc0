export type CsvCell = string | number | boolean | null | undefined;

function escapeCell(value: CsvCell): string {
  const str = value === null || value === undefined ? '' : String(value);
  return /[",\r\n]/.test(str)
    ? `"${str.replace(/"/g, '""')}"`
    : str;
}

/**
 * Serialize rows to CSV with CRLF line endings
 */
export function toCsv(rows: CsvCell[][]): string {
  return rows.map((row) => row.map(escapeCell).join(',')).join('\r\n') + '\r\n';
}
