/**
 * Retrying Fetcher
 * Layer: Application
 *
 * One request against one endpoint, classified by outcome:
 *
 *   no response / timeout / 5xx   transient  → backoff and retry, then
 *                                              TransportError('exhausted')
 *   404                           permanent  → TransportError('endpoint-gone')
 *   other non-2xx                 permanent  → TransportError('rejected')
 *   2xx with a query-error body   permanent  → QuerySyntaxError
 *   2xx otherwise                 success    → RawResponse
 *
 * `fetchDocument` applies the same rules to a plain GET with no search
 * parameters. Only transient outcomes are retried. The sleep function is injected so tests
 * can record delays instead of waiting them out.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Endpoint } from '@domain/entities/Endpoint';
import type { IHttpTransport, QueryParams } from '@domain/interfaces/IHttpTransport';
import { NetworkError, QuerySyntaxError, TransportError } from '@shared/errors/IngestionError';
import type { FetchRequest, RawResponse } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { createBackoffSchedule, type RetryPolicy, type Sleep } from './backoff';
import { detectQueryError } from './queryErrorDetector';
import { buildRequestParams, type DateField } from './searchQuery';

interface RequestContext {
  /** Endpoint id, or a label for non-search requests; ends up in TransportError. */
  source: string;
  page?: number;
}

export interface FetchSettings {
  timeoutMs: number;
  dateField: DateField;
  timezone: string;
  maintenanceSignature: string;
}

@injectable()
export class RetryingFetcher {
  constructor(
    @inject(TOKENS.HttpTransport) private transport: IHttpTransport,
    @inject(TOKENS.RetryPolicy) private policy: RetryPolicy,
    @inject(TOKENS.FetchSettings) private settings: FetchSettings,
    @inject(TOKENS.Sleep) private sleep: Sleep,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async fetch(endpoint: Endpoint, request: FetchRequest): Promise<RawResponse> {
    const params = buildRequestParams(endpoint, request, {
      dateField: this.settings.dateField,
      timezone: this.settings.timezone,
    });
    return this.request(endpoint.url, params, { source: endpoint.id, page: request.page });
  }

  /** A single document (e.g. one decision's metadata) under the same retry rules. */
  async fetchDocument(url: string, source: string): Promise<RawResponse> {
    return this.request(url, {}, { source });
  }

  private async request(
    url: string,
    params: QueryParams,
    context: RequestContext,
  ): Promise<RawResponse> {
    const { source } = context;
    const nextDelay = createBackoffSchedule(this.policy);

    for (let attempt = 1; ; attempt++) {
      let transientReason: string;

      try {
        const response = await this.transport.get(url, params, {
          timeoutMs: this.settings.timeoutMs,
        });
        const status = response.statusCode;

        if (status >= 200 && status < 300) {
          const detail = detectQueryError(response.body, this.settings.maintenanceSignature);
          if (detail !== null) throw new QuerySyntaxError(detail);
          return response;
        }
        if (status === 404) {
          throw new TransportError('endpoint-gone', attempt, source, 'HTTP 404');
        }
        if (status < 500) {
          throw new TransportError('rejected', attempt, source, `HTTP ${status}`);
        }
        transientReason = `HTTP ${status}`;
      } catch (err) {
        if (!(err instanceof NetworkError)) throw err;
        transientReason = err.timedOut ? 'timeout' : err.message;
      }

      if (attempt >= this.policy.maxAttempts) {
        throw new TransportError('exhausted', attempt, source, transientReason);
      }

      const delayMs = nextDelay();
      this.log.warn(
        { source, page: context.page, attempt, delayMs, reason: transientReason },
        'Transient upstream failure, retrying',
      );
      await this.sleep(delayMs);
    }
  }
}
