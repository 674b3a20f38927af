/**
 * Integration Tests — GET /api/v1/upstream/health
 *
 * One probe per registered endpoint, in registry order, through the real
 * MaintenanceProbe. The transport is a FakeTransport answering by the
 * requested format (`wt`).
 */
import { config } from '@core/config';
import { TOKENS } from '@core/types';
import type { IHttpTransport } from '@domain/interfaces/IHttpTransport';
import { NetworkError } from '@shared/errors/IngestionError';
import type { Express } from 'express';
import request from 'supertest';
import { container } from 'tsyringe';

import { FakeTransport, reply } from '../helpers/fakeTransport';
import { emptyPageBody, maintenanceBody } from '../helpers/fixtures';

let app: Express;
const transport = new FakeTransport();

beforeAll(async () => {
  await import('@core/container');
  container.register<IHttpTransport>(TOKENS.HttpTransport, { useValue: transport });

  const { createApp } = await import('@interfaces/http/app');
  app = createApp();
});

afterEach(() => {
  transport.reset();
});

describe('GET /api/v1/upstream/health', () => {
  it('should return a verdict per endpoint in registry order', async () => {
    transport.respondWith((call) =>
      call.params.wt === 'json' ? reply(200, emptyPageBody) : reply(200, maintenanceBody),
    );

    const res = await request(app).get('/api/v1/upstream/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'success',
      data: {
        endpoints: [
          { id: 'primary-json', url: config.upstream.primary.url, format: 'json', verdict: 'healthy' },
          { id: 'fallback-xml', url: config.upstream.fallback.url, format: 'xml', verdict: 'maintenance' },
        ],
      },
    });
    expect(transport.calls.map((c) => c.params.size)).toEqual([1, 1]);
  });

  it('should answer "unknown" when the upstream does not respond', async () => {
    transport.respondWith(() => {
      throw new NetworkError('timeout of 60000ms exceeded', true, 'ECONNABORTED');
    });

    const res = await request(app).get('/api/v1/upstream/health');

    expect(res.status).toBe(200);
    expect(res.body.data.endpoints.map((e: { verdict: string }) => e.verdict)).toEqual(['unknown', 'unknown']);
  });

  it('should answer "unknown" on a server error', async () => {
    transport.respondWith(() => reply(503, 'Service Unavailable', 'text/html'));

    const res = await request(app).get('/api/v1/upstream/health');

    expect(res.body.data.endpoints.map((e: { verdict: string }) => e.verdict)).toEqual(['unknown', 'unknown']);
  });
});
