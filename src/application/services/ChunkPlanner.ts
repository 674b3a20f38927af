/**
 * Chunk Planner
 * Layer: Application
 *
 * The upstream fails (5xx) on wide date ranges, so every run is cut into
 * sub-ranges no wider than the active endpoint's safe span. The plan is a
 * partition: consecutive, no gaps, no overlaps, first start = interval start,
 * last end = interval end.
 *
 *   span ≥ 1 month  → boundaries on calendar-month starts (source zone), each
 *                     chunk covering at most N whole months
 *   span < 1 month  → fixed-size steps counted from interval.start
 *
 * A span given in days or hours counts as N months only for N * (31 days + 1
 * hour): a 31-day month that ends on a DST fall-back is one hour longer than
 * 31 days, and a month chunk must never be longer than the span it stands for.
 */
import { TOKENS } from '@core/types';
import { createDateInterval, type DateInterval } from '@domain/entities/DateInterval';
import { ValidationError } from '@shared/errors/AppError';
import { DateTime, Duration } from 'luxon';
import { inject, injectable } from 'tsyringe';

const LONGEST_MONTH_MS = Duration.fromObject({ days: 31, hours: 1 }).toMillis();

interface IntervalBounds {
  start: Date;
  end: Date;
}

@injectable()
export class ChunkPlanner {
  constructor(@inject(TOKENS.SourceTimezone) private readonly timezone: string) {}

  plan(interval: IntervalBounds, maxSpan: Duration): DateInterval[] {
    const spanMs = maxSpan.isValid ? maxSpan.toMillis() : NaN;
    if (!(spanMs > 0)) {
      throw new ValidationError(`Chunk span must be positive, got ${maxSpan.toISO() ?? 'invalid'}`);
    }

    const startMs = interval.start.getTime();
    const endMs = interval.end.getTime();
    if (!(startMs < endMs)) return [];

    const months = wholeMonths(maxSpan);
    return months >= 1
      ? this.planByCalendarMonths(startMs, endMs, months)
      : planFixedSteps(startMs, endMs, spanMs);
  }

  /** Plans each interval separately and concatenates, after merging touching intervals. */
  planMany(intervals: readonly DateInterval[], maxSpan: Duration): DateInterval[] {
    return mergeAdjacent(intervals).flatMap((interval) => this.plan(interval, maxSpan));
  }

  private planByCalendarMonths(startMs: number, endMs: number, months: number): DateInterval[] {
    const chunks: DateInterval[] = [];
    let cursor = startMs;
    while (cursor < endMs) {
      const boundary = DateTime.fromMillis(cursor, { zone: this.timezone })
        .startOf('month')
        .plus({ months })
        .toMillis();
      const next = Math.min(boundary, endMs);
      chunks.push(createDateInterval(new Date(cursor), new Date(next)));
      cursor = next;
    }
    return chunks;
  }
}

function planFixedSteps(startMs: number, endMs: number, stepMs: number): DateInterval[] {
  const chunks: DateInterval[] = [];
  for (let cursor = startMs; cursor < endMs; cursor += stepMs) {
    chunks.push(createDateInterval(new Date(cursor), new Date(Math.min(cursor + stepMs, endMs))));
  }
  return chunks;
}

/** Whole calendar months a span can safely stand for. */
export function wholeMonths(span: Duration): number {
  const units = span.toObject();
  const calendarOnly = Object.entries(units).every(
    ([unit, value]) => unit === 'years' || unit === 'months' || value === 0,
  );
  if (calendarOnly) {
    return (units.years ?? 0) * 12 + (units.months ?? 0);
  }
  return Math.floor(span.toMillis() / LONGEST_MONTH_MS);
}

/** Sorts intervals and joins the ones that touch or overlap. */
export function mergeAdjacent(intervals: readonly DateInterval[]): DateInterval[] {
  const sorted = [...intervals].sort((a, b) => a.start.getTime() - b.start.getTime());
  const merged: DateInterval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.start.getTime() <= last.end.getTime()) {
      if (interval.end.getTime() > last.end.getTime()) {
        merged[merged.length - 1] = createDateInterval(last.start, interval.end);
      }
    } else {
      merged.push(interval);
    }
  }
  return merged;
}
