import type { RawResponse } from '@shared/types';

export type QueryParams = Readonly<Record<string, string | number>>;

export interface TransportRequestOptions {
  timeoutMs: number;
}

/**
 * HTTP Transport Port
 * Layer: Domain
 *
 * The fetcher and the probe only need "GET this URL with these params and hand
 * me status, body and content type". Every HTTP status is a resolved response;
 * classification is the caller's job. When no response arrives at all (DNS,
 * refused connection, timeout) the transport throws a NetworkError.
 *
 * AxiosTransport is the production implementation; tests pass an in-process
 * fake.
 */
export interface IHttpTransport {
  get(url: string, params: QueryParams, options: TransportRequestOptions): Promise<RawResponse>;
}
