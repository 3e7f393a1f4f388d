import type { CellValue, Table } from './table';

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : '';
  }
  return String(value);
}

function escapeCsv(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Renders a table as CSV with a header row. Missing cells become empty fields so
 * that a `COPY INTO ... EMPTY_FIELD_AS_NULL = TRUE` load restores them as null.
 */
export function renderCsv(table: Table): string {
  if (table.columns.length === 0) {
    return '';
  }
  const header = table.columns.map((column) => escapeCsv(column)).join(',');
  const lines = table.rows.map((row) =>
    table.columns.map((column) => escapeCsv(formatCell(row[column]))).join(',')
  );
  return `${[header, ...lines].join('\n')}\n`;
}

export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let index = 0;

  const endField = () => {
    record.push(field);
    field = '';
  };
  const endRecord = () => {
    endField();
    records.push(record);
    record = [];
  };

  while (index < text.length) {
    const char = text[index];
    if (quoted) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 2;
          continue;
        }
        quoted = false;
      } else {
        field += char;
      }
      index += 1;
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      endField();
    } else if (char === '\r') {
      if (text[index + 1] === '\n') {
        index += 1;
      }
      endRecord();
    } else if (char === '\n') {
      endRecord();
    } else {
      field += char;
    }
    index += 1;
  }

  if (quoted) {
    throw new Error('Unterminated quoted field in CSV input');
  }
  if (field.length > 0 || record.length > 0) {
    endRecord();
  }
  return records;
}
