/**
 * Search query rendering for the upstream's query language.
 *
 *   issueDate:[DT(2024-01-01T00:00:00) TO DT(2024-01-31T23:59:59)]
 *   organizationUid:"99220018" AND type:"Β.1.3" AND "road works"
 *
 * DT bounds are local times in the source zone and inclusive at both ends, so
 * the half-open interval's end is rendered one second earlier. The `keyword`
 * filter is a free phrase and always stays in `q`; other filters go to `fq`
 * when the endpoint accepts a filter query.
 */
import type { DateInterval } from '@domain/entities/DateInterval';
import type { Endpoint } from '@domain/entities/Endpoint';
import type { QueryParams } from '@domain/interfaces/IHttpTransport';
import { DEFAULT_SORT, QUERY_DATE_FORMAT, WIRE_PARAMS } from '@shared/constants';
import type { FetchRequest, SearchFilters } from '@shared/types';
import { DateTime } from 'luxon';

export type DateField = 'issueDate' | 'submissionTimestamp' | 'publishTimestamp';

export const KEYWORD_FILTER = 'keyword';

export interface QueryRenderOptions {
  dateField: DateField;
  timezone: string;
  supportsFieldFilter: boolean;
}

export interface RenderedQuery {
  q: string;
  fq?: string;
}

export function renderDateClause(interval: DateInterval, dateField: DateField, timezone: string): string {
  const lastSecond = Math.max(interval.start.getTime(), interval.end.getTime() - 1000);
  const from = DateTime.fromJSDate(interval.start, { zone: timezone }).toFormat(QUERY_DATE_FORMAT);
  const to = DateTime.fromMillis(lastSecond, { zone: timezone }).toFormat(QUERY_DATE_FORMAT);
  return `${dateField}:[DT(${from}) TO DT(${to})]`;
}

function quote(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

export function renderSearchQuery(
  interval: DateInterval,
  filters: SearchFilters,
  options: QueryRenderOptions,
): RenderedQuery {
  const queryClauses = [renderDateClause(interval, options.dateField, options.timezone)];
  const filterClauses: string[] = [];

  for (const [field, rawValue] of Object.entries(filters)) {
    const value = rawValue.trim();
    if (!value) continue;
    if (field === KEYWORD_FILTER) {
      queryClauses.push(quote(value));
    } else {
      filterClauses.push(`${field}:${quote(value)}`);
    }
  }

  if (options.supportsFieldFilter && filterClauses.length > 0) {
    return { q: queryClauses.join(' AND '), fq: filterClauses.join(' AND ') };
  }
  const all = [...queryClauses, ...filterClauses];
  return { q: all.join(' AND ') };
}

export function buildRequestParams(
  endpoint: Endpoint,
  request: FetchRequest,
  options: Omit<QueryRenderOptions, 'supportsFieldFilter'>,
): QueryParams {
  const { q, fq } = renderSearchQuery(request.interval, request.filters, {
    ...options,
    supportsFieldFilter: endpoint.supportsFieldFilter,
  });
  return {
    [WIRE_PARAMS.QUERY]: q,
    ...(fq !== undefined && { [WIRE_PARAMS.FILTER_QUERY]: fq }),
    [WIRE_PARAMS.FORMAT]: endpoint.responseFormat,
    [WIRE_PARAMS.PAGE]: request.page,
    [WIRE_PARAMS.SIZE]: request.pageSize,
    [WIRE_PARAMS.SORT]: DEFAULT_SORT,
  };
}
