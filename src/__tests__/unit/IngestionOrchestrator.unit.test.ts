/**
 * Unit Tests — IngestionOrchestrator
 *
 * Real planner, fetcher, extractor and probe over a FakeTransport. The
 * responder tells probe calls (q=*:*) from chunk calls and answers chunk
 * calls by the local start day in their date clause, so each scenario reads
 * as "what the upstream does for which month".
 */
import { narrowerSpan, summarizeIngestion } from '@application/services/IngestionOrchestrator';
import { createDateInterval, type DateInterval } from '@domain/entities/DateInterval';
import { NetworkError, SchemaError } from '@shared/errors/IngestionError';
import { Duration } from 'luxon';

import {
  chunkStart,
  FakeTransport,
  isMaintenanceCheck,
  pagedList,
  pagedListWithTotal,
  reply,
} from '../helpers/fakeTransport';
import { emptyPageBody, maintenanceBody } from '../helpers/fixtures';
import {
  buildPipeline,
  FALLBACK_URL,
  fallbackEndpoint,
  local,
  METADATA_URL,
  PRIMARY_URL,
  primaryEndpoint,
} from '../helpers/pipeline';

const firstQuarter = createDateInterval(local('2024-01-01T00:00'), local('2024-04-01T00:00'));
const january = createDateInterval(local('2024-01-01T00:00'), local('2024-02-01T00:00'));
const february = createDateInterval(local('2024-02-01T00:00'), local('2024-03-01T00:00'));
const march = createDateInterval(local('2024-03-01T00:00'), local('2024-04-01T00:00'));

const adaCodes = (records: { adaCode: string }[]) => records.map((r) => r.adaCode);
const isoBounds = (intervals: DateInterval[]) =>
  intervals.map((i) => [i.start.toISOString(), i.end.toISOString()]);

describe('IngestionOrchestrator', () => {
  let transport: FakeTransport;

  beforeEach(() => {
    transport = new FakeTransport();
  });

  describe('healthy run', () => {
    it('should fetch one chunk per month and report healthy', async () => {
      transport.respondWith((call) =>
        isMaintenanceCheck(call) ? reply(200, emptyPageBody) : reply(200, pagedList(chunkStart(call), [`ADA-${chunkStart(call)}`])),
      );
      const { orchestrator } = buildPipeline(transport);

      const result = await orchestrator.run(firstQuarter);

      expect(transport.fetchCalls.map(chunkStart).sort()).toEqual(['2024-01-01', '2024-02-01', '2024-03-01']);
      expect(adaCodes(result.records)).toEqual(['ADA-2024-01-01', 'ADA-2024-02-01', 'ADA-2024-03-01']);
      expect(result.failedIntervals).toEqual([]);
      expect(result.health).toBe('healthy');
      expect(result.cancelled).toBe(false);
    });

    it('should pass filters through to every chunk request', async () => {
      transport.respondWith(() => reply(200, emptyPageBody));
      const { orchestrator } = buildPipeline(transport);

      await orchestrator.run(january, { organizationUid: '99220018' });

      expect(transport.fetchCalls).toHaveLength(1);
      expect(transport.fetchCalls[0]?.params.fq).toBe('organizationUid:"99220018"');
    });

    it('should keep chunk order regardless of completion order', async () => {
      transport.respondWith(async (call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const day = chunkStart(call);
        if (day === '2024-01-01') await new Promise((resolve) => setTimeout(resolve, 25));
        return reply(200, pagedList(day, [`ADA-${day}`]));
      });
      const { orchestrator } = buildPipeline(transport, { orchestrator: { concurrency: 3 } });

      const result = await orchestrator.run(firstQuarter);

      expect(adaCodes(result.records)).toEqual(['ADA-2024-01-01', 'ADA-2024-02-01', 'ADA-2024-03-01']);
    });

    it('should deduplicate ADA codes across chunks, keeping the earliest chunk', async () => {
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const day = chunkStart(call);
        return reply(200, pagedList(day, ['SHARED-1', `ADA-${day}`], { organizationId: `org-${day}` }));
      });
      const { orchestrator } = buildPipeline(transport);

      const result = await orchestrator.run(firstQuarter);

      expect(adaCodes(result.records)).toEqual([
        'SHARED-1',
        'ADA-2024-01-01',
        'ADA-2024-02-01',
        'ADA-2024-03-01',
      ]);
      expect(result.records[0]?.organizationId).toBe('org-2024-01-01');
    });
  });

  describe('health gate', () => {
    it('should skip fetching entirely when every endpoint is in maintenance', async () => {
      transport.respondWith(() => reply(200, maintenanceBody));
      const { orchestrator } = buildPipeline(transport, {
        endpoints: [primaryEndpoint, fallbackEndpoint],
      });

      const result = await orchestrator.run(firstQuarter);

      expect(result).toEqual({
        records: [],
        failedIntervals: [firstQuarter],
        health: 'maintenance',
        cancelled: false,
        limitReached: false,
      });
      expect(transport.calls).toHaveLength(2);
      expect(transport.fetchCalls).toHaveLength(0);
    });

    it('should treat unreachable endpoints like maintenance', async () => {
      transport.respondWith(() => {
        throw new NetworkError('timeout of 1000ms exceeded', true, 'ECONNABORTED');
      });
      const { orchestrator } = buildPipeline(transport);

      const result = await orchestrator.run(january);

      expect(result.health).toBe('maintenance');
      expect(result.failedIntervals).toEqual([january]);
      expect(transport.fetchCalls).toHaveLength(0);
    });

    it('should use the first healthy endpoint in registry order', async () => {
      transport.respondWith((call) => {
        if (call.url === PRIMARY_URL) return reply(200, maintenanceBody);
        if (isMaintenanceCheck(call)) return reply(200, '<decisionResults/>', 'application/xml');
        return reply(200, '<decisionResults><total>0</total></decisionResults>', 'application/xml');
      });
      const { orchestrator } = buildPipeline(transport, {
        endpoints: [primaryEndpoint, fallbackEndpoint],
      });

      const result = await orchestrator.run(january);

      expect(result.health).toBe('healthy');
      expect(transport.fetchCalls.every((call) => call.url === FALLBACK_URL)).toBe(true);
      // 31 days at a 7-day span
      expect(transport.fetchCalls).toHaveLength(5);
    });
  });

  describe('chunk failures', () => {
    it('should record a QuerySyntaxError chunk as failed and keep the others', async () => {
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const day = chunkStart(call);
        return day === '2024-02-01' ? reply(200, maintenanceBody) : reply(200, pagedList(day, [`ADA-${day}`]));
      });
      const { orchestrator } = buildPipeline(transport);

      const result = await orchestrator.run(firstQuarter);

      expect(adaCodes(result.records)).toEqual(['ADA-2024-01-01', 'ADA-2024-03-01']);
      expect(result.failedIntervals).toEqual([february]);
      expect(result.health).toBe('maintenance');
    });

    it('should record a chunk as failed once its retries are exhausted', async () => {
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const day = chunkStart(call);
        return day === '2024-03-01' ? reply(503, '') : reply(200, pagedList(day, [`ADA-${day}`]));
      });
      const { orchestrator } = buildPipeline(transport, { retry: { maxAttempts: 2 } });

      const result = await orchestrator.run(firstQuarter);

      expect(result.failedIntervals).toEqual([march]);
      expect(transport.fetchCalls.filter((call) => chunkStart(call) === '2024-03-01')).toHaveLength(2);
      expect(result.health).toBe('maintenance');
    });

    it('should fail the whole run on an unknown response shape', async () => {
      transport.respondWith((call) =>
        isMaintenanceCheck(call) ? reply(200, emptyPageBody) : reply(200, JSON.stringify({ unexpected: true })),
      );
      const { orchestrator } = buildPipeline(transport);

      await expect(orchestrator.run(firstQuarter)).rejects.toBeInstanceOf(SchemaError);
    });
  });

  describe('endpoint fallback', () => {
    it('should replan the remaining window against the next endpoint on 404', async () => {
      const window = createDateInterval(local('2024-01-01T00:00'), local('2024-01-15T00:00'));
      transport.respondWith((call) => {
        if (call.url === PRIMARY_URL) {
          return isMaintenanceCheck(call) ? reply(200, emptyPageBody) : reply(404, 'Not Found', 'text/html');
        }
        const day = chunkStart(call);
        return reply(
          200,
          `<decisionResults><decision><ada>XML-${day}</ada><issueDate>${day}T12:00:00+02:00</issueDate></decision></decisionResults>`,
          'application/xml',
        );
      });
      const { orchestrator } = buildPipeline(transport, {
        endpoints: [primaryEndpoint, fallbackEndpoint],
      });

      const result = await orchestrator.run(window);

      const fallbackCalls = transport.fetchCalls.filter((call) => call.url === FALLBACK_URL);
      expect(fallbackCalls.map(chunkStart).sort()).toEqual(['2024-01-01', '2024-01-08']);
      expect(fallbackCalls.every((call) => call.params.wt === 'xml')).toBe(true);
      expect(adaCodes(result.records)).toEqual(['XML-2024-01-01', 'XML-2024-01-08']);
      expect(result.health).toBe('healthy');
    });

    it('should report the remaining window as failed when no endpoint is left', async () => {
      transport.respondWith((call) => (isMaintenanceCheck(call) ? reply(200, emptyPageBody) : reply(404, '')));
      const { orchestrator } = buildPipeline(transport, { orchestrator: { concurrency: 1 } });

      const result = await orchestrator.run(firstQuarter);

      expect(transport.fetchCalls).toHaveLength(1);
      expect(isoBounds(result.failedIntervals)).toEqual(isoBounds([january, february, march]));
      expect(result.records).toEqual([]);
      expect(result.health).toBe('maintenance');
    });
  });

  describe('paging', () => {
    it('should keep fetching pages while they come back full', async () => {
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const page = call.params.page;
        return reply(200, page === 0 ? pagedList('2024-01-02', ['P-1', 'P-2']) : pagedList('2024-01-03', ['P-3']));
      });
      const { orchestrator } = buildPipeline(transport, { orchestrator: { pageSize: 2 } });

      const result = await orchestrator.run(january);

      expect(transport.fetchCalls.map((call) => call.params.page)).toEqual([0, 1]);
      expect(adaCodes(result.records)).toEqual(['P-1', 'P-2', 'P-3']);
    });

    it('should fail a chunk that is still full at the page limit', async () => {
      let counter = 0;
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        counter += 1;
        return reply(200, pagedList('2024-01-02', [`P-${counter}`]));
      });
      const { orchestrator } = buildPipeline(transport, {
        orchestrator: { pageSize: 1, maxPagesPerChunk: 3 },
      });

      const result = await orchestrator.run(january);

      expect(transport.fetchCalls).toHaveLength(3);
      expect(result.records).toEqual([]);
      expect(result.failedIntervals).toEqual([january]);
    });

    it('should follow the reported total when the server caps the page size', async () => {
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const page = Number(call.params.page);
        const size = page < 2 ? 100 : 50;
        const codes = Array.from({ length: size }, (_, i) => `C-${page}-${i}`);
        return reply(200, pagedListWithTotal('2024-01-10', codes, 250));
      });
      const { orchestrator } = buildPipeline(transport, { orchestrator: { pageSize: 500 } });

      const result = await orchestrator.run(january);

      expect(transport.fetchCalls.map((call) => call.params.page)).toEqual([0, 1, 2]);
      expect(result.records).toHaveLength(250);
      expect(result.records[100]?.adaCode).toBe('C-1-0');
      expect(result.failedIntervals).toEqual([]);
    });

    it('should fail a chunk whose pages run out before the reported total', async () => {
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        return reply(
          200,
          call.params.page === 0
            ? pagedListWithTotal('2024-01-10', ['T-1', 'T-2'], 5)
            : pagedListWithTotal('2024-01-10', [], 5),
        );
      });
      const { orchestrator } = buildPipeline(transport);

      const result = await orchestrator.run(january);

      expect(transport.fetchCalls).toHaveLength(2);
      expect(result.records).toEqual([]);
      expect(result.failedIntervals).toEqual([january]);
      expect(result.health).toBe('maintenance');
    });

    it('should stop after one page when the total is already reached', async () => {
      transport.respondWith((call) =>
        isMaintenanceCheck(call) ? reply(200, emptyPageBody) : reply(200, pagedListWithTotal('2024-01-10', ['T-1'], 1)),
      );
      const { orchestrator } = buildPipeline(transport, { orchestrator: { pageSize: 1 } });

      const result = await orchestrator.run(january);

      expect(transport.fetchCalls).toHaveLength(1);
      expect(adaCodes(result.records)).toEqual(['T-1']);
    });
  });

  describe('record limit', () => {
    it('should stop issuing chunks once the limit is met and cut the output to it', async () => {
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const day = chunkStart(call);
        return reply(200, pagedList(day, [`${day}-a`, `${day}-b`]));
      });
      const { orchestrator } = buildPipeline(transport, { orchestrator: { concurrency: 1 } });

      const result = await orchestrator.run(firstQuarter, {}, { limit: 3 });

      expect(transport.fetchCalls.map(chunkStart)).toEqual(['2024-01-01', '2024-02-01']);
      expect(adaCodes(result.records)).toEqual(['2024-01-01-a', '2024-01-01-b', '2024-02-01-a']);
      expect(result.failedIntervals).toEqual([]);
      expect(result.health).toBe('healthy');
      expect(result.limitReached).toBe(true);
    });

    it('should count duplicate ADA codes once toward the limit', async () => {
      transport.respondWith((call) =>
        isMaintenanceCheck(call) ? reply(200, emptyPageBody) : reply(200, pagedList(chunkStart(call), ['SAME'])),
      );
      const { orchestrator } = buildPipeline(transport, { orchestrator: { concurrency: 1 } });

      const result = await orchestrator.run(firstQuarter, {}, { limit: 2 });

      expect(transport.fetchCalls).toHaveLength(3);
      expect(adaCodes(result.records)).toEqual(['SAME']);
      expect(result.limitReached).toBe(false);
    });
  });

  describe('span override', () => {
    it('should plan with a narrower span than the endpoint allows', async () => {
      transport.respondWith(() => reply(200, emptyPageBody));
      const { orchestrator } = buildPipeline(transport, { orchestrator: { concurrency: 1 } });

      await orchestrator.run(january, {}, { maxSpan: Duration.fromObject({ days: 10 }) });

      expect(transport.fetchCalls.map(chunkStart)).toEqual([
        '2024-01-01',
        '2024-01-11',
        '2024-01-21',
        '2024-01-31',
      ]);
    });

    it('should ignore a span wider than the endpoint allows', async () => {
      transport.respondWith(() => reply(200, emptyPageBody));
      const { orchestrator } = buildPipeline(transport);

      await orchestrator.run(firstQuarter, {}, { maxSpan: Duration.fromObject({ months: 3 }) });

      expect(transport.fetchCalls).toHaveLength(3);
    });
  });

  describe('metadata enrichment', () => {
    it('should merge each decision document into rawFields and keep records without one', async () => {
      transport.respondWith((call) => {
        if (call.url === `${METADATA_URL}/ADA-1`) {
          return reply(200, JSON.stringify({ subject: 'Road works', decisionTypeId: 'Β.2.1' }));
        }
        if (call.url === `${METADATA_URL}/ADA-2`) return reply(404, '');
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        return reply(200, pagedList('2024-01-15', ['ADA-1', 'ADA-2']));
      });
      const { orchestrator } = buildPipeline(transport);

      const result = await orchestrator.run(january, {}, { enrich: true });

      expect(result.records[0]?.rawFields).toEqual({
        ada: 'ADA-1',
        issueDate: '2024-01-15T12:00:00+02:00',
        organizationId: '99220018',
        decisionTypeId: 'Β.2.1',
        subject: 'Road works',
      });
      expect(result.records[0]?.subjectCode).toBe('Β.1.3');
      expect(result.records[1]?.rawFields).toEqual({
        ada: 'ADA-2',
        issueDate: '2024-01-15T12:00:00+02:00',
        organizationId: '99220018',
        decisionTypeId: 'Β.1.3',
      });
      expect(result.health).toBe('healthy');
    });

    it('should not request documents unless asked to', async () => {
      transport.respondWith((call) =>
        isMaintenanceCheck(call) ? reply(200, emptyPageBody) : reply(200, pagedList('2024-01-15', ['ADA-1'])),
      );
      const { orchestrator } = buildPipeline(transport);

      await orchestrator.run(january);

      expect(transport.calls.some((call) => call.url.startsWith(METADATA_URL))).toBe(false);
    });

    it('should only enrich the records left after the limit', async () => {
      transport.respondWith((call) => {
        if (call.url.startsWith(METADATA_URL)) return reply(200, '{}');
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        return reply(200, pagedList('2024-01-15', ['ADA-1', 'ADA-2', 'ADA-3']));
      });
      const { orchestrator } = buildPipeline(transport);

      await orchestrator.run(january, {}, { enrich: true, limit: 2 });

      expect(transport.calls.filter((call) => call.url.startsWith(METADATA_URL)).map((call) => call.url)).toEqual([
        `${METADATA_URL}/ADA-1`,
        `${METADATA_URL}/ADA-2`,
      ]);
    });
  });

  describe('cancellation', () => {
    it('should stop issuing chunks once aborted and report the rest as failed', async () => {
      const abort = new AbortController();
      transport.respondWith((call) => {
        if (isMaintenanceCheck(call)) return reply(200, emptyPageBody);
        const day = chunkStart(call);
        abort.abort();
        return reply(200, pagedList(day, [`ADA-${day}`]));
      });
      const { orchestrator } = buildPipeline(transport, { orchestrator: { concurrency: 1 } });

      const result = await orchestrator.run(firstQuarter, {}, { signal: abort.signal });

      expect(transport.fetchCalls).toHaveLength(1);
      expect(adaCodes(result.records)).toEqual(['ADA-2024-01-01']);
      expect(result.failedIntervals).toEqual([february, march]);
      expect(result.cancelled).toBe(true);
      expect(result.health).toBe('maintenance');
    });
  });
});

describe('summarizeIngestion', () => {
  it('should count records and failed intervals', () => {
    expect(
      summarizeIngestion({
        records: [],
        failedIntervals: [january, february],
        health: 'maintenance',
        cancelled: false,
        limitReached: false,
      }),
    ).toEqual({ health: 'maintenance', failedIntervalCount: 2, recordCount: 0 });
  });
});

describe('narrowerSpan', () => {
  const month = Duration.fromObject({ months: 1 });

  it('should keep the endpoint span without an override', () => {
    expect(narrowerSpan(month, undefined)).toBe(month);
  });

  it('should take the override only when it is narrower', () => {
    const day = Duration.fromObject({ days: 1 });
    const quarter = Duration.fromObject({ months: 3 });

    expect(narrowerSpan(month, day)).toBe(day);
    expect(narrowerSpan(month, quarter)).toBe(month);
  });
});
