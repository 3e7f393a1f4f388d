import { AlignmentError } from './errors';
import {
  AVERAGE_CARBON_INTENSITY,
  DEFAULT_TIME_ZONE,
  MARGINAL_OPERATING_EMISSIONS_RATE
} from './sources';
import {
  isMissing,
  projectRow,
  unionColumns,
  type AlignedRow,
  type AlignedTable,
  type CellValue,
  type Table,
  type TableRow
} from './table';
import { isValidTimeZone, parseUtcInstant, toZonedDate } from './timeZone';

export interface AlignOptions {
  timeZone?: string;
  /** Timestamp column of each input, in argument order. */
  timestampColumns?: [string, string];
}

interface IndexedRow {
  instant: number;
  values: TableRow;
}

function indexRows(table: Table, timestampColumn: string, columns: string[], label: string): IndexedRow[] {
  if (!table.columns.includes(timestampColumn)) {
    throw new AlignmentError(
      `${label} is missing timestamp column '${timestampColumn}'`,
      timestampColumn
    );
  }

  return table.rows.map((row, position) => {
    const instant = parseUtcInstant(row[timestampColumn]);
    if (instant === null) {
      throw new AlignmentError(
        `${label} row ${position} has an unreadable ${timestampColumn} value: ${String(row[timestampColumn])}`,
        timestampColumn
      );
    }
    return { instant, values: projectRow(row, columns) };
  });
}

/**
 * Fills each missing cell with the next present value in the same column.
 * Cells with no later value stay null.
 */
export function backfill(rows: TableRow[], columns: string[]): TableRow[] {
  const filled = rows.map((row) => ({ ...row }));
  const next = new Map<string, CellValue>();
  for (let index = filled.length - 1; index >= 0; index -= 1) {
    const row = filled[index];
    for (const column of columns) {
      const value = row[column];
      if (isMissing(value)) {
        row[column] = next.get(column) ?? null;
      } else {
        next.set(column, value);
      }
    }
  }
  return filled;
}

/**
 * Stacks two series on a shared time index. Rows are not joined: each input row
 * stays a row of its own, with null for the columns only the other input has,
 * before the backward fill runs over the time-ordered result.
 */
export function alignSeries(seriesA: Table, seriesB: Table, options: AlignOptions = {}): AlignedTable {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  if (!isValidTimeZone(timeZone)) {
    throw new AlignmentError(`Unknown time zone '${timeZone}'`);
  }
  const [timestampA, timestampB] = options.timestampColumns ?? [
    AVERAGE_CARBON_INTENSITY.timestampColumn,
    MARGINAL_OPERATING_EMISSIONS_RATE.timestampColumn
  ];

  const columns = unionColumns(seriesA.columns, seriesB.columns);
  const stacked = [
    ...indexRows(seriesA, timestampA, columns, 'First series'),
    ...indexRows(seriesB, timestampB, columns, 'Second series')
  ].sort((left, right) => left.instant - right.instant);

  const filled = backfill(
    stacked.map((row) => row.values),
    columns
  );

  const rows: AlignedRow[] = stacked.map((row, index) => ({
    datetime: toZonedDate(row.instant, timeZone),
    values: filled[index]
  }));

  return { timeZone, columns, rows };
}
