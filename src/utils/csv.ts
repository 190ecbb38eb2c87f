export type CsvCell = string | number | null | undefined;

// Quotes a field when it holds a comma, quote or line break
const escapeCsvCell = (value: CsvCell): string => {
  if (value === null || value === undefined) return '';
  const s = String(value);
  if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
};

export const toCsv = (headers: string[], rows: Record<string, CsvCell>[]): string => {
  const headerLine = headers.map(escapeCsvCell).join(',');
  const dataLines = rows.map((row) => headers.map((h) => escapeCsvCell(row[h])).join(','));
  return [headerLine, ...dataLines].join('\r\n');
};
