/**
 * Argument parsing for the ingest CLI, kept apart from the script so it can be
 * tested without running a fetch.
 *
 *   --month 2024-03                       one calendar month
 *   --from 2024-01-01 --to 2024-04-01     half-open window [from, to)
 *   (neither)                             the previous calendar month
 *
 *   --limit N          stop once N distinct decisions are in
 *   --span P10D        chunk span (ISO-8601 duration), only if narrower
 *                      than the endpoint's own
 *   --chunk-by-day     same as --span P1D
 *   --enrich           merge each decision's metadata document
 *
 * Dates are local to the source zone.
 */
import type { DateInterval } from '@domain/entities/DateInterval';
import { createDateInterval } from '@domain/entities/DateInterval';
import { ValidationError } from '@shared/errors/AppError';
import { monthInterval, parseLocalDate, previousMonthInterval } from '@shared/localDates';
import { Duration } from 'luxon';

export interface IngestCliOptions {
  interval: DateInterval;
  filters: Record<string, string>;
  output?: string;
  store: boolean;
  migrate: boolean;
  enrich: boolean;
  limit?: number;
  maxSpan?: Duration;
}

const ONE_DAY = Duration.fromObject({ days: 1 });

/** CLI flag → upstream filter field. */
const FILTER_FLAGS: Readonly<Record<string, string>> = {
  '--org': 'organizationUid',
  '--type': 'type',
  '--keyword': 'keyword',
};

export function parseIngestArgs(
  args: readonly string[],
  now: Date,
  timezone: string,
): IngestCliOptions {
  const getArg = (flag: string): string | undefined => {
    const idx = args.indexOf(flag);
    if (idx === -1) return undefined;
    const value = args[idx + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ValidationError(`${flag} needs a value`);
    }
    return value;
  };
  const hasFlag = (flag: string): boolean => args.includes(flag);

  const filters: Record<string, string> = {};
  for (const [flag, field] of Object.entries(FILTER_FLAGS)) {
    const value = getArg(flag);
    if (value !== undefined) filters[field] = value;
  }

  return {
    interval: resolveInterval(getArg('--month'), getArg('--from'), getArg('--to'), now, timezone),
    filters,
    output: getArg('--output'),
    store: hasFlag('--store'),
    migrate: hasFlag('--migrate'),
    enrich: hasFlag('--enrich'),
    limit: parseLimit(getArg('--limit')),
    maxSpan: resolveSpan(getArg('--span'), hasFlag('--chunk-by-day')),
  };
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const limit = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new ValidationError(`--limit must be a positive integer, got "${value}"`);
  }
  return limit;
}

function resolveSpan(span: string | undefined, byDay: boolean): Duration | undefined {
  if (span !== undefined && byDay) {
    throw new ValidationError('--span cannot be combined with --chunk-by-day');
  }
  if (byDay) return ONE_DAY;
  if (span === undefined) return undefined;

  const duration = Duration.fromISO(span);
  if (!duration.isValid || !(duration.toMillis() > 0)) {
    throw new ValidationError(`--span must be a positive ISO-8601 duration such as P7D, got "${span}"`);
  }
  return duration;
}

function resolveInterval(
  month: string | undefined,
  from: string | undefined,
  to: string | undefined,
  now: Date,
  timezone: string,
): DateInterval {
  if (month !== undefined) {
    if (from !== undefined || to !== undefined) {
      throw new ValidationError('--month cannot be combined with --from/--to');
    }
    const interval = monthInterval(month, timezone);
    if (!interval) throw new ValidationError(`--month must be YYYY-MM, got "${month}"`);
    return interval;
  }

  if (from === undefined && to === undefined) {
    return previousMonthInterval(now, timezone);
  }
  if (from === undefined || to === undefined) {
    throw new ValidationError('--from and --to must be given together');
  }

  const start = parseLocalDate(from, timezone);
  const end = parseLocalDate(to, timezone);
  if (!start) throw new ValidationError(`--from is not a date: "${from}"`);
  if (!end) throw new ValidationError(`--to is not a date: "${to}"`);
  return createDateInterval(start, end);
}
