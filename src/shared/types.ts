/**
 * Shared Type Definitions
 * Layer: Shared
 *
 * Request/response shapes that cross layers: the fetch request the orchestrator
 * hands to the fetcher, the raw response the transport returns, and the result
 * and summary a run produces for its callers.
 */
import type { DateInterval } from '@domain/entities/DateInterval';
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import type { Duration } from 'luxon';

/** Field → value filters, e.g. { organizationUid: '99220018', type: 'Β.1.3' }. */
export type SearchFilters = Readonly<Record<string, string>>;

export interface FetchRequest {
  readonly interval: DateInterval;
  readonly filters: SearchFilters;
  readonly page: number;
  readonly pageSize: number;
}

export interface RawResponse {
  statusCode: number;
  body: string;
  contentType: string;
}

export type HealthVerdict = 'healthy' | 'maintenance' | 'unknown';

export interface IngestionResult {
  records: DisclosureRecord[];
  failedIntervals: DateInterval[];
  /** Mandatory: an empty `records` list means nothing without it. */
  health: HealthVerdict;
  /** True when the run was aborted; unfetched chunks are in failedIntervals. */
  cancelled: boolean;
  /** True when `limit` stopped the run before every chunk was fetched. */
  limitReached: boolean;
}

/** What the alerting/email collaborator receives. */
export interface IngestionSummary {
  health: HealthVerdict;
  failedIntervalCount: number;
  recordCount: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Merge each decision's metadata document into its rawFields. */
  enrich?: boolean;
  /**
   * Stop issuing chunks once this many distinct records are in, and cut the
   * output to it. Chunks never started are neither fetched nor failed.
   */
  limit?: number;
  /** Chunk span override; only used when narrower than the endpoint's safe span. */
  maxSpan?: Duration;
}

/** What IngestionService hands back to the HTTP layer and the CLI. */
export interface IngestionReport {
  result: IngestionResult;
  summary: IngestionSummary;
  /** Rows written to the record cache. */
  storedCount: number;
  /**
   * Records cached by earlier runs for the same window. Only loaded when the
   * run is not healthy, for the "data unavailable" rendering path.
   */
  fallbackRecords: DisclosureRecord[];
}
