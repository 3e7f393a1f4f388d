import type { TZDate } from '@date-fns/tz';

import { bucketEnd, type Bucket } from './buckets';
import {
  AVERAGE_CARBON_INTENSITY,
  DELTA_COLUMN,
  MARGINAL_OPERATING_EMISSIONS_RATE
} from './sources';
import { isMissing, type AlignedRow, type AlignedTable } from './table';

export interface AggregatedRow {
  bucketEnd: TZDate;
  rowCount: number;
  values: Record<string, number | null>;
}

export interface AggregatedTable {
  bucket: Bucket;
  timeZone: string;
  columns: string[];
  rows: AggregatedRow[];
}

export interface SpreadPoint {
  datetime: TZDate;
  value: number | null;
}

export interface BucketTrace {
  bucketEnd: TZDate;
  points: SpreadPoint[];
}

export interface BucketMean {
  bucketEnd: TZDate;
  value: number | null;
}

export interface MarginalSpread {
  bucket: Bucket;
  timeZone: string;
  traces: BucketTrace[];
  mean: BucketMean[];
  skipped: TZDate[];
}

interface BucketGroup {
  bucketEnd: TZDate;
  rows: AlignedRow[];
}

function groupByBucket(table: AlignedTable, bucket: Bucket): BucketGroup[] {
  const groups = new Map<number, BucketGroup>();
  for (const row of table.rows) {
    const end = bucketEnd(row.datetime, bucket);
    const key = end.getTime();
    const group = groups.get(key);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(key, { bucketEnd: end, rows: [row] });
    }
  }
  return [...groups.entries()]
    .sort(([left], [right]) => left - right)
    .map(([, group]) => group);
}

export function numericColumns(table: AlignedTable): string[] {
  return table.columns.filter((column) => {
    let seen = false;
    for (const row of table.rows) {
      const value = row.values[column];
      if (isMissing(value)) {
        continue;
      }
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return false;
      }
      seen = true;
    }
    return seen;
  });
}

function mean(rows: AlignedRow[], column: string): number | null {
  let sum = 0;
  let count = 0;
  for (const row of rows) {
    const value = row.values[column];
    if (typeof value === 'number' && Number.isFinite(value)) {
      sum += value;
      count += 1;
    }
  }
  return count === 0 ? null : sum / count;
}

/**
 * Means of every numeric column per calendar bucket, plus the marginal minus
 * average delta computed from each bucket's own means. Buckets without rows
 * are not emitted.
 */
export function aggregateByBucket(table: AlignedTable, bucket: Bucket): AggregatedTable {
  const columns = numericColumns(table);
  const marginal = MARGINAL_OPERATING_EMISSIONS_RATE.rateColumn;
  const average = AVERAGE_CARBON_INTENSITY.rateColumn;

  const rows = groupByBucket(table, bucket).map((group) => {
    const values: Record<string, number | null> = {};
    for (const column of columns) {
      values[column] = mean(group.rows, column);
    }
    const marginalMean = values[marginal] ?? null;
    const averageMean = values[average] ?? null;
    values[DELTA_COLUMN] =
      marginalMean === null || averageMean === null ? null : marginalMean - averageMean;
    return { bucketEnd: group.bucketEnd, rowCount: group.rows.length, values };
  });

  return {
    bucket,
    timeZone: table.timeZone,
    columns: [...columns, DELTA_COLUMN],
    rows
  };
}

/**
 * Per-row marginal rates of each bucket next to the bucket means. A bucket
 * whose rows carry no marginal rate column is left out of `traces` and listed
 * in `skipped`.
 */
export function marginalSpread(table: AlignedTable, bucket: Bucket): MarginalSpread {
  const column = MARGINAL_OPERATING_EMISSIONS_RATE.rateColumn;
  const traces: BucketTrace[] = [];
  const means: BucketMean[] = [];
  const skipped: TZDate[] = [];

  for (const group of groupByBucket(table, bucket)) {
    if (!group.rows.some((row) => column in row.values)) {
      skipped.push(group.bucketEnd);
    } else {
      traces.push({
        bucketEnd: group.bucketEnd,
        points: group.rows.map((row) => {
          const value = row.values[column];
          return {
            datetime: row.datetime,
            value: typeof value === 'number' && Number.isFinite(value) ? value : null
          };
        })
      });
    }
    means.push({ bucketEnd: group.bucketEnd, value: mean(group.rows, column) });
  }

  return { bucket, timeZone: table.timeZone, traces, mean: means, skipped };
}
