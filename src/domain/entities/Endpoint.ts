/**
 * Endpoint — one candidate upstream URL
 * Layer: Domain
 *
 * Built once at startup from config. `safeSpan` is the widest date range the
 * endpoint is known to answer reliably; the chunk planner never asks for more.
 */
import type { Duration } from 'luxon';

export type ResponseFormat = 'json' | 'xml';

export interface Endpoint {
  readonly id: string;
  readonly url: string;
  readonly responseFormat: ResponseFormat;
  readonly supportsFieldFilter: boolean;
  readonly supportsPaging: boolean;
  readonly safeSpan: Duration;
}
