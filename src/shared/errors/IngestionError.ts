/**
 * Ingestion Error Taxonomy
 * Layer: Shared
 *
 *   TransportError     connectivity/availability. `endpoint-gone` (404) makes the
 *                      orchestrator fall back to the next endpoint; `exhausted`
 *                      (transient failures past the retry budget) and `rejected`
 *                      (other 4xx) fail the chunk.
 *   QuerySyntaxError   the upstream answered 200 but rejected the query. This is
 *                      the maintenance-mode symptom; it fails the chunk and the run
 *                      is reported as `maintenance`.
 *   SchemaError        the payload matched no known shape. Fatal for the run.
 *
 * NetworkError is what a transport throws when no HTTP response arrived at all;
 * it never leaves RetryingFetcher or MaintenanceProbe.
 */
import { AppError } from './AppError';

export type TransportErrorKind = 'endpoint-gone' | 'exhausted' | 'rejected';

export class TransportError extends AppError {
  constructor(
    public readonly kind: TransportErrorKind,
    public readonly attempts: number,
    public readonly endpointId: string,
    detail?: string,
  ) {
    super(
      `Transport failure (${kind}) on endpoint "${endpointId}" after ${attempts} attempt(s)` +
        (detail ? `: ${detail}` : ''),
      kind === 'endpoint-gone' ? 502 : 503,
    );
  }
}

export class QuerySyntaxError extends AppError {
  constructor(public readonly detail: string) {
    super(`Upstream rejected the query: ${detail}`, 503);
  }
}

export class SchemaError extends AppError {
  constructor(public readonly observedShape: string) {
    super(`Unrecognized response shape: ${observedShape}`, 502, false);
  }
}

export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly timedOut: boolean,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
