import { TZDate } from '@date-fns/tz';

export function isValidTimeZone(timeZone: string): boolean {
  if (timeZone.trim().length === 0) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const NAIVE_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a warehouse timestamp into epoch milliseconds. Timestamps without an
 * offset are read as UTC.
 */
export function parseUtcInstant(value: unknown): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  let normalized = trimmed;
  const naive = trimmed.match(NAIVE_DATE_TIME);
  if (naive) {
    normalized = `${naive[1]}T${naive[2]}Z`;
  } else if (DATE_ONLY.test(trimmed)) {
    normalized = `${trimmed}T00:00:00Z`;
  } else {
    normalized = trimmed.replace(' ', 'T');
  }
  const parsed = Date.parse(normalized);
  return Number.isNaN(parsed) ? null : parsed;
}

export function toZonedDate(instant: number, timeZone: string): TZDate {
  return new TZDate(instant, timeZone);
}
