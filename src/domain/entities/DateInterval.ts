/**
 * Date Interval — half-open [start, end)
 * Layer: Domain
 *
 * Every chunk, failed range and query window is one of these. Instances built
 * through `createDateInterval` are frozen and satisfy start < end; the planner
 * also accepts raw `{ start, end }` pairs so it can answer an inverted range
 * with an empty plan instead of an error.
 */
import { ValidationError } from '@shared/errors/AppError';

export interface DateInterval {
  readonly start: Date;
  readonly end: Date;
}

export function createDateInterval(start: Date, end: Date): DateInterval {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new ValidationError('Interval bounds must be valid dates');
  }
  if (start.getTime() >= end.getTime()) {
    throw new ValidationError(
      `Interval start must be before end (${start.toISOString()} >= ${end.toISOString()})`,
    );
  }
  return Object.freeze({ start: new Date(start.getTime()), end: new Date(end.getTime()) });
}

export function compareIntervals(a: DateInterval, b: DateInterval): number {
  return a.start.getTime() - b.start.getTime() || a.end.getTime() - b.end.getTime();
}

/** ISO rendering used in logs and API responses. */
export function describeInterval(interval: DateInterval): string {
  return `[${interval.start.toISOString()}, ${interval.end.toISOString()})`;
}
