/**
 * POST /api/v1/ingest body.
 *
 *   { "from": "2024-01-01", "to": "2024-04-01", "filters": { "organizationUid": "99220018" },
 *     "limit": 200, "span": "P7D", "enrich": true }
 *
 * `from`/`to` are local dates (or date-times) in the source zone and describe
 * the half-open window [from, to). The parsed body carries a ready
 * DateInterval and the run options; `span` becomes a luxon Duration.
 */
import { config } from '@core/config';
import { createDateInterval } from '@domain/entities/DateInterval';
import { LOCAL_DATE_PATTERN, parseLocalDate } from '@shared/localDates';
import { Duration } from 'luxon';
import { z } from 'zod/v4';

const localDate = z
  .string()
  .regex(LOCAL_DATE_PATTERN, {
    message: 'Expected YYYY-MM-DD or YYYY-MM-DDTHH:mm[:ss]',
    abort: true,
  });

export const ingestRequestSchema = z
  .object({
    from: localDate,
    to: localDate,
    filters: z.record(z.string(), z.string()).optional(),
    enrich: z.boolean().optional(),
    limit: z.number().int().positive().optional(),
    span: z
      .string()
      .refine((value) => isPositiveDuration(Duration.fromISO(value)), {
        message: 'Expected a positive ISO-8601 duration such as P7D',
      })
      .optional(),
  })
  .transform((body, ctx) => {
    const start = parseLocalDate(body.from, config.upstream.timezone);
    const end = parseLocalDate(body.to, config.upstream.timezone);
    if (!start || !end) {
      ctx.addIssue({ code: 'custom', message: 'from/to must be real calendar dates' });
      return z.NEVER;
    }
    if (start.getTime() >= end.getTime()) {
      ctx.addIssue({ code: 'custom', message: '"from" must be before "to"' });
      return z.NEVER;
    }
    return {
      interval: createDateInterval(start, end),
      filters: body.filters ?? {},
      options: {
        enrich: body.enrich ?? false,
        limit: body.limit,
        maxSpan: body.span === undefined ? undefined : Duration.fromISO(body.span),
      },
    };
  });

function isPositiveDuration(duration: Duration): boolean {
  return duration.isValid && duration.toMillis() > 0;
}

export type IngestRequest = z.output<typeof ingestRequestSchema>;
