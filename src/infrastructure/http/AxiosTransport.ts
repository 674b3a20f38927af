/**
 * Axios HTTP Transport
 * Layer: Infrastructure
 *
 * Thin adapter from IHttpTransport onto a shared axios instance with
 * keep-alive agents. Every status resolves (`validateStatus` always true) and
 * the body is kept as raw text, because both status classification and shape
 * detection happen upstream of here. Requests that never got a response are
 * rethrown as NetworkError with `timedOut` set for axios' timeout codes.
 */
import http from 'node:http';
import https from 'node:https';

import type {
  IHttpTransport,
  QueryParams,
  TransportRequestOptions,
} from '@domain/interfaces/IHttpTransport';
import { NetworkError } from '@shared/errors/IngestionError';
import type { RawResponse } from '@shared/types';
import axios, { type AxiosInstance, isAxiosError } from 'axios';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const httpAgent = new http.Agent({ keepAlive: true, maxSockets: 16 });
const httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 16 });

export function createUpstreamClient(userAgent: string): AxiosInstance {
  return axios.create({
    httpAgent,
    httpsAgent,
    headers: {
      'User-Agent': userAgent,
      Accept: 'application/json, application/xml;q=0.9, */*;q=0.5',
    },
  });
}

export class AxiosTransport implements IHttpTransport {
  constructor(private readonly client: AxiosInstance) {}

  async get(url: string, params: QueryParams, options: TransportRequestOptions): Promise<RawResponse> {
    try {
      const response = await this.client.get<string>(url, {
        params,
        timeout: options.timeoutMs,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      });

      const contentType = response.headers['content-type'];
      return {
        statusCode: response.status,
        body: typeof response.data === 'string' ? response.data : '',
        contentType: typeof contentType === 'string' ? contentType : '',
      };
    } catch (err) {
      if (isAxiosError(err)) {
        const code = err.code;
        throw new NetworkError(err.message, code !== undefined && TIMEOUT_CODES.has(code), code);
      }
      throw err;
    }
  }
}
