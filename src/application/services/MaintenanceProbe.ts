/**
 * Maintenance Probe
 * Layer: Application
 *
 * While in maintenance the upstream rejects every query, whatever it says, with
 * the same exception identifier. One wildcard request with size=1 is enough to
 * tell, and it is far cheaper than discovering it chunk by chunk through the
 * retry budget.
 *
 *   query-error body (signature or exception + message)  → 'maintenance'
 *   no response / timeout / non-2xx                        → 'unknown'
 *   anything else                                          → 'healthy'
 *
 * 'unknown' is an absence of signal, not proof of an outage. No retries here.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Endpoint } from '@domain/entities/Endpoint';
import type { IHttpTransport } from '@domain/interfaces/IHttpTransport';
import { WILDCARD_QUERY, WIRE_PARAMS } from '@shared/constants';
import { NetworkError } from '@shared/errors/IngestionError';
import type { HealthVerdict } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { detectQueryError } from './queryErrorDetector';
import type { FetchSettings } from './RetryingFetcher';

export interface EndpointHealth {
  endpoint: Endpoint;
  verdict: HealthVerdict;
}

@injectable()
export class MaintenanceProbe {
  constructor(
    @inject(TOKENS.HttpTransport) private transport: IHttpTransport,
    @inject(TOKENS.FetchSettings) private settings: FetchSettings,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async check(endpoint: Endpoint): Promise<HealthVerdict> {
    const params = {
      [WIRE_PARAMS.QUERY]: WILDCARD_QUERY,
      [WIRE_PARAMS.FORMAT]: endpoint.responseFormat,
      [WIRE_PARAMS.PAGE]: 0,
      [WIRE_PARAMS.SIZE]: 1,
    };

    let status: number;
    let body: string;
    try {
      const response = await this.transport.get(endpoint.url, params, {
        timeoutMs: this.settings.timeoutMs,
      });
      status = response.statusCode;
      body = response.body;
    } catch (err) {
      if (!(err instanceof NetworkError)) throw err;
      this.log.warn({ endpoint: endpoint.id, timedOut: err.timedOut, err: err.message }, 'Probe got no response');
      return 'unknown';
    }

    if (status < 200 || status >= 300) {
      this.log.warn({ endpoint: endpoint.id, status }, 'Probe got a non-success status');
      return 'unknown';
    }

    const detail = detectQueryError(body, this.settings.maintenanceSignature);
    if (detail !== null) {
      this.log.warn({ endpoint: endpoint.id, detail }, 'Upstream is in maintenance mode');
      return 'maintenance';
    }

    this.log.debug({ endpoint: endpoint.id }, 'Upstream endpoint healthy');
    return 'healthy';
  }

  /** Probes every endpoint in order; used by the upstream health route. */
  async checkAll(endpoints: readonly Endpoint[]): Promise<EndpointHealth[]> {
    const results: EndpointHealth[] = [];
    for (const endpoint of endpoints) {
      results.push({ endpoint, verdict: await this.check(endpoint) });
    }
    return results;
  }
}
