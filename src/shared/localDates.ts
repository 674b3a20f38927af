/**
 * Local calendar input → instants.
 *
 * Callers (HTTP body, CLI flags) speak in calendar dates of the source zone:
 * "2024-03-01", "2024-03-01T12:00", "2024-03". These helpers turn them into
 * half-open DateIntervals without going through the host's time zone.
 */
import { createDateInterval, type DateInterval } from '@domain/entities/DateInterval';
import { DateTime } from 'luxon';

export const LOCAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2})?)?$/;
export const MONTH_PATTERN = /^\d{4}-\d{2}$/;

export function parseLocalDate(text: string, timezone: string): Date | undefined {
  if (!LOCAL_DATE_PATTERN.test(text)) return undefined;
  const parsed = DateTime.fromISO(text, { zone: timezone });
  return parsed.isValid ? parsed.toJSDate() : undefined;
}

/** The whole calendar month "yyyy-MM". */
export function monthInterval(month: string, timezone: string): DateInterval | undefined {
  if (!MONTH_PATTERN.test(month)) return undefined;
  const start = DateTime.fromFormat(month, 'yyyy-MM', { zone: timezone });
  if (!start.isValid) return undefined;
  return createDateInterval(start.toJSDate(), start.plus({ months: 1 }).toJSDate());
}

/** The calendar month before the one `now` falls in. */
export function previousMonthInterval(now: Date, timezone: string): DateInterval {
  const thisMonth = DateTime.fromJSDate(now, { zone: timezone }).startOf('month');
  return createDateInterval(thisMonth.minus({ months: 1 }).toJSDate(), thisMonth.toJSDate());
}
