/**
 * Table output format: a key/value block for a single record, columns for
 * a list of records.
 */

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function formatTable(data: unknown): string {
  if (Array.isArray(data)) {
    const rows = data.filter(isRow);
    return rows.length === 0 ? 'No entries.\n' : renderColumns(rows);
  }
  return isRow(data) ? renderRecord(data) : `${formatCell(data)}\n`;
}

function formatCell(value: unknown): string {
  return value === null || value === undefined ? '—' : String(value);
}

function renderColumns(rows: Row[]): string {
  const columns = Object.keys(rows[0] ?? {});
  const widths = columns.map((column) =>
    Math.max(column.length, ...rows.map((row) => formatCell(row[column]).length))
  );
  const line = (cells: string[]): string =>
    cells
      .map((cell, i) => cell.padEnd(widths[i] ?? 0))
      .join('  ')
      .trimEnd();

  const lines = [
    line(columns),
    widths.map((width) => '─'.repeat(width)).join('──'),
    ...rows.map((row) => line(columns.map((column) => formatCell(row[column])))),
  ];
  return lines.join('\n') + '\n';
}

function renderRecord(record: Row): string {
  const keys = Object.keys(record);
  const width = Math.max(0, ...keys.map((key) => key.length));
  return keys.map((key) => `${key.padEnd(width)}  ${formatCell(record[key])}`).join('\n') + '\n';
}
