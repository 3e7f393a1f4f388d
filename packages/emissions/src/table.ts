import type { TZDate } from '@date-fns/tz';

export type CellValue = string | number | boolean | Date | null;

export type TableRow = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: TableRow[];
}

export interface AlignedRow {
  datetime: TZDate;
  values: TableRow;
}

export interface AlignedTable {
  timeZone: string;
  columns: string[];
  rows: AlignedRow[];
}

export function createTable(columns: string[], rows: TableRow[] = []): Table {
  return {
    columns: [...columns],
    rows: rows.map((row) => projectRow(row, columns))
  };
}

export function projectRow(row: TableRow, columns: string[]): TableRow {
  const projected: TableRow = {};
  for (const column of columns) {
    projected[column] = row[column] ?? null;
  }
  return projected;
}

export function isMissing(value: CellValue | undefined): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  return typeof value === 'number' && Number.isNaN(value);
}

export function unionColumns(...columnSets: string[][]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const columns of columnSets) {
    for (const column of columns) {
      if (!seen.has(column)) {
        seen.add(column);
        result.push(column);
      }
    }
  }
  return result;
}

export function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return JSON.stringify(value);
}
