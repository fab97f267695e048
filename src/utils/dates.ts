import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

/**
 * Whole days elapsed between two instants, compared in UTC and truncated
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  return dayjs.utc(to).diff(dayjs.utc(from), 'day');
}

/**
 * ISO calendar date (`YYYY-MM-DD`) of an instant in UTC
 */
export function toIsoDate(date: Date): string {
  return dayjs.utc(date).format('YYYY-MM-DD');
}
