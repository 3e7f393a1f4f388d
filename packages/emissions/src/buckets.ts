import type { TZDate } from '@date-fns/tz';
import { endOfMonth, endOfWeek, endOfYear, startOfDay } from 'date-fns';

export const BUCKETS = ['week', 'month', 'year'] as const;

export type Bucket = (typeof BUCKETS)[number];

const BUCKET_ALIASES = new Map<string, Bucket>([
  ['week', 'week'],
  ['w', 'week'],
  ['month', 'month'],
  ['m', 'month'],
  ['year', 'year'],
  ['y', 'year']
]);

export function parseBucket(value: string): Bucket | null {
  return BUCKET_ALIASES.get(value.trim().toLowerCase()) ?? null;
}

/**
 * Label of the calendar bucket containing `date`: local midnight of the
 * bucket's last day. Weeks run Monday through Sunday.
 */
export function bucketEnd(date: TZDate, bucket: Bucket): TZDate {
  switch (bucket) {
    case 'week':
      return startOfDay(endOfWeek(date, { weekStartsOn: 1 }));
    case 'month':
      return startOfDay(endOfMonth(date));
    case 'year':
      return startOfDay(endOfYear(date));
  }
}
