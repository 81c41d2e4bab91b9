/**
 * Date Utilities
 *
 * Parsing and bucketing of time values for time-series charts. All values
 * are read as UTC so buckets never shift with the host timezone.
 */

import moment from 'moment-timezone';
import type { CellValue } from '@/types/tools.js';

export type TimeGranularity = 'day' | 'month';

const ACCEPTED_FORMATS: moment.MomentFormatSpecification = [
  moment.ISO_8601,
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY/MM/DD',
  'YYYY-MM',
];

const BUCKET_FORMATS: Record<TimeGranularity, string> = {
  day: 'YYYY-MM-DD',
  month: 'YYYY-MM',
};

/**
 * Strictly parses a date or datetime string. Numbers are not accepted since
 * a bare number is ambiguous between epoch values and date parts.
 *
 * @returns The parsed moment, or null if the value is not a date
 */
export function parseTimeValue(value: CellValue): moment.Moment | null {
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const parsed = moment.utc(value.trim(), ACCEPTED_FORMATS, true);
  return parsed.isValid() ? parsed : null;
}

export function formatTimeBucket(time: moment.Moment, granularity: TimeGranularity): string {
  return time.clone().utc().format(BUCKET_FORMATS[granularity]);
}

/**
 * Returns the bucket label for a raw value, or null if it is not a date
 */
export function toTimeBucket(value: CellValue, granularity: TimeGranularity): string | null {
  const parsed = parseTimeValue(value);
  return parsed ? formatTimeBucket(parsed, granularity) : null;
}

