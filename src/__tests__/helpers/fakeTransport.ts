/**
 * In-process HTTP transport for tests.
 *
 * Every call is recorded; the reply comes from a responder function the test
 * sets (and may swap between tests). Throw a NetworkError from the responder
 * to simulate a timeout or a refused connection.
 */
import type {
  IHttpTransport,
  QueryParams,
  TransportRequestOptions,
} from '@domain/interfaces/IHttpTransport';
import { WILDCARD_QUERY } from '@shared/constants';
import type { RawResponse } from '@shared/types';

export interface TransportCall {
  url: string;
  params: QueryParams;
  options: TransportRequestOptions;
}

export type Responder = (call: TransportCall) => RawResponse | Promise<RawResponse>;

export class FakeTransport implements IHttpTransport {
  readonly calls: TransportCall[] = [];

  constructor(private responder: Responder = () => reply(200, '')) {}

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  reset(): void {
    this.calls.length = 0;
  }

  async get(url: string, params: QueryParams, options: TransportRequestOptions): Promise<RawResponse> {
    const call = { url, params, options };
    this.calls.push(call);
    return this.responder(call);
  }

  /** Calls that were not maintenance checks. */
  get fetchCalls(): TransportCall[] {
    return this.calls.filter((call) => !isMaintenanceCheck(call));
  }
}

export function reply(statusCode: number, body: string, contentType = 'application/json'): RawResponse {
  return { statusCode, body, contentType };
}

export function isMaintenanceCheck(call: TransportCall): boolean {
  return call.params.q === WILDCARD_QUERY;
}

/** Local start day of the chunk a call asks for ("2024-02-01"), from its DT(...) clause. */
export function chunkStart(call: TransportCall): string {
  const q = call.params.q;
  const match = typeof q === 'string' ? /DT\((\d{4}-\d{2}-\d{2})/.exec(q) : null;
  if (!match?.[1]) throw new Error(`Call has no date clause: ${String(q)}`);
  return match[1];
}

/** Responder that answers calls in order, repeating the last reply. */
export function sequence(...replies: Array<RawResponse | Error>): Responder {
  let index = 0;
  return () => {
    const next = replies[Math.min(index, replies.length - 1)];
    index += 1;
    if (next === undefined) throw new Error('sequence() needs at least one reply');
    if (next instanceof Error) throw next;
    return next;
  };
}

/** Paged-list JSON body with one decision per ADA code, issued at noon local time on `day`. */
export function pagedList(day: string, adaCodes: readonly string[], extra: Record<string, string> = {}): string {
  return JSON.stringify({
    decisionResultList: adaCodes.map((ada) => ({
      ada,
      issueDate: `${day}T12:00:00+02:00`,
      organizationId: '99220018',
      decisionTypeId: 'Β.1.3',
      ...extra,
    })),
  });
}

/** Same as pagedList, plus the `info.total` the upstream reports for the whole query. */
export function pagedListWithTotal(day: string, adaCodes: readonly string[], total: number): string {
  return JSON.stringify({
    ...JSON.parse(pagedList(day, adaCodes)),
    info: { total },
  });
}
