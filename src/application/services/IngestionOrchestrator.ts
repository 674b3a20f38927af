/**
 * Ingestion Orchestrator
 * Layer: Application
 *
 * One run = probe → plan → fetch chunks → merge.
 *
 *   1. Probe endpoints in registry order; the first healthy one is active. With
 *      none healthy the run ends before any chunk fetch and reports the whole
 *      window as failed under 'maintenance'.
 *   2. Plan chunks no wider than the active endpoint's safe span (or the
 *      caller's `maxSpan`, when narrower).
 *   3. Workers (up to `concurrency`) pull chunks from a shared cursor. Each chunk
 *      is fetched page by page and extracted; it contributes records only when
 *      every page succeeded. Paging follows the `total` the upstream reports,
 *      so a server that caps the page size below `pageSize` is still read to
 *      the end; without a total, a short page is the last one.
 *        endpoint-gone            stop issuing chunks, drain in-flight ones,
 *                                 replan what is left against the next endpoint
 *        exhausted / rejected /   chunk goes to failedIntervals, run continues
 *        query syntax error
 *        schema error             fatal, rethrown once the workers have drained
 *   4. Records are merged in chunk start order and de-duplicated by ADA code,
 *      cut to `limit`, then optionally enriched with their metadata documents.
 *
 * Cancellation through the AbortSignal stops new chunk fetches; in-flight ones
 * finish. Unfetched chunks are reported as failed and the result is flagged
 * `cancelled`.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { type DateInterval, describeInterval } from '@domain/entities/DateInterval';
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import type { Endpoint } from '@domain/entities/Endpoint';
import type { EndpointRegistry } from '@infrastructure/upstream/EndpointRegistry';
import { QuerySyntaxError, TransportError } from '@shared/errors/IngestionError';
import type {
  IngestionResult,
  IngestionSummary,
  RunOptions,
  SearchFilters,
} from '@shared/types';
import type { Duration } from 'luxon';
import { inject, injectable } from 'tsyringe';

import { ChunkPlanner } from './ChunkPlanner';
import { ChunkResultCollector } from './ChunkResultCollector';
import { MaintenanceProbe } from './MaintenanceProbe';
import { MetadataEnricher } from './MetadataEnricher';
import { ResponseExtractor } from './ResponseExtractor';
import { RetryingFetcher } from './RetryingFetcher';

export interface OrchestratorOptions {
  pageSize: number;
  maxPagesPerChunk: number;
  concurrency: number;
}

/** Shared by the workers of one pass; only ever touched between awaits. */
interface PassState {
  next: number;
  endpointGone: boolean;
  cancelled: boolean;
  limitReached: boolean;
  fatal?: Error;
  gone: DateInterval[];
}

interface PassOutcome {
  /** Intervals still to fetch because the endpoint disappeared. */
  remaining: DateInterval[];
  cancelled: boolean;
  limitReached: boolean;
}

@injectable()
export class IngestionOrchestrator {
  constructor(
    @inject(TOKENS.EndpointRegistry) private registry: EndpointRegistry,
    @inject(TOKENS.MaintenanceProbe) private probe: MaintenanceProbe,
    @inject(TOKENS.ChunkPlanner) private planner: ChunkPlanner,
    @inject(TOKENS.RetryingFetcher) private fetcher: RetryingFetcher,
    @inject(TOKENS.ResponseExtractor) private extractor: ResponseExtractor,
    @inject(TOKENS.MetadataEnricher) private enricher: MetadataEnricher,
    @inject(TOKENS.OrchestratorOptions) private options: OrchestratorOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async run(
    overall: DateInterval,
    filters: SearchFilters = {},
    { signal, enrich = false, limit, maxSpan }: RunOptions = {},
  ): Promise<IngestionResult> {
    const window = describeInterval(overall);
    const startIndex = await this.selectHealthyEndpoint();

    if (startIndex === -1) {
      this.log.warn({ window }, 'No healthy upstream endpoint, skipping fetch');
      return {
        records: [],
        failedIntervals: [overall],
        health: 'maintenance',
        cancelled: false,
        limitReached: false,
      };
    }

    const collector = new ChunkResultCollector();
    let pending: DateInterval[] = [overall];
    let cancelled = false;
    let limitReached = false;

    for (let index = startIndex; pending.length > 0; index++) {
      const endpoint = this.registry.at(index);
      if (!endpoint) {
        this.log.error({ window, unfetched: pending.length }, 'No endpoint left to fall back to');
        pending.forEach((interval) => collector.fail(interval));
        break;
      }

      const span = narrowerSpan(endpoint.safeSpan, maxSpan);
      const chunks = this.planner.planMany(pending, span);
      this.log.info({ endpoint: endpoint.id, chunks: chunks.length, window }, 'Fetching chunks');

      const outcome = await this.runPass(endpoint, chunks, filters, collector, signal, limit);
      if (outcome.cancelled) {
        cancelled = true;
        outcome.remaining.forEach((interval) => collector.fail(interval));
        break;
      }
      if (outcome.limitReached) {
        limitReached = true;
        break;
      }
      if (outcome.remaining.length > 0) {
        this.log.warn({ endpoint: endpoint.id }, 'Endpoint gone, falling back to the next one');
      }
      pending = outcome.remaining;
    }

    const collected = collector.finish();
    const limited = limit === undefined ? collected.records : collected.records.slice(0, limit);
    const records = enrich && limited.length > 0 ? await this.enricher.enrich(limited, signal) : limited;

    const result: IngestionResult = {
      records,
      failedIntervals: collected.failedIntervals,
      health: collected.failedIntervals.length === 0 ? 'healthy' : 'maintenance',
      cancelled,
      limitReached,
    };
    this.log.info(
      { window, ...summarizeIngestion(result), cancelled, limitReached },
      'Ingestion run finished',
    );
    return result;
  }

  /** Index of the first healthy endpoint, or -1. */
  private async selectHealthyEndpoint(): Promise<number> {
    const endpoints = this.registry.all();
    for (let index = 0; index < endpoints.length; index++) {
      const endpoint = endpoints[index];
      if (endpoint && (await this.probe.check(endpoint)) === 'healthy') return index;
    }
    return -1;
  }

  private async runPass(
    endpoint: Endpoint,
    chunks: readonly DateInterval[],
    filters: SearchFilters,
    collector: ChunkResultCollector,
    signal: AbortSignal | undefined,
    limit: number | undefined,
  ): Promise<PassOutcome> {
    const state: PassState = {
      next: 0,
      endpointGone: false,
      cancelled: false,
      limitReached: false,
      gone: [],
    };

    const worker = async (): Promise<void> => {
      while (!state.endpointGone && !state.fatal) {
        if (signal?.aborted) {
          state.cancelled = true;
          return;
        }
        const chunk = chunks[state.next];
        if (!chunk) return;
        if (limit !== undefined && collector.recordCount >= limit) {
          state.limitReached = true;
          return;
        }
        state.next += 1;

        try {
          const records = await this.fetchChunk(endpoint, chunk, filters);
          if (records) {
            collector.add(chunk, records);
          } else {
            collector.fail(chunk);
          }
        } catch (err) {
          if (err instanceof TransportError && err.kind === 'endpoint-gone') {
            state.endpointGone = true;
            state.gone.push(chunk);
          } else if (err instanceof TransportError || err instanceof QuerySyntaxError) {
            this.log.warn(
              { endpoint: endpoint.id, chunk: describeInterval(chunk), err: err.message },
              'Chunk failed',
            );
            collector.fail(chunk);
          } else {
            state.fatal ??= err instanceof Error ? err : new Error(String(err));
          }
        }
      }
    };

    const workers = Math.max(1, Math.min(this.options.concurrency, chunks.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    if (state.fatal) throw state.fatal;

    const unstarted = chunks.slice(state.next);
    if (state.cancelled) {
      return { remaining: [...state.gone, ...unstarted], cancelled: true, limitReached: false };
    }
    if (state.limitReached) {
      return { remaining: [], cancelled: false, limitReached: true };
    }
    return {
      remaining: state.endpointGone ? [...state.gone, ...unstarted] : [],
      cancelled: false,
      limitReached: false,
    };
  }

  /**
   * All pages of one chunk, or null when the chunk cannot be read completely:
   * the page cap was hit, or the upstream ran out of records before the total
   * it reported.
   */
  private async fetchChunk(
    endpoint: Endpoint,
    interval: DateInterval,
    filters: SearchFilters,
  ): Promise<DisclosureRecord[] | null> {
    const { pageSize, maxPagesPerChunk } = this.options;
    const chunk = describeInterval(interval);
    const records: DisclosureRecord[] = [];
    let total: number | undefined;

    for (let page = 0; page < maxPagesPerChunk; page++) {
      const raw = await this.fetcher.fetch(endpoint, { interval, filters, page, pageSize });
      const extracted = this.extractor.extractPage(raw);
      records.push(...extracted.records);
      total ??= extracted.total;

      if (!endpoint.supportsPaging) return records;
      if (total === undefined) {
        if (extracted.records.length < pageSize) return records;
        continue;
      }
      if (records.length >= total) return records;
      if (extracted.records.length === 0) {
        this.log.warn(
          { endpoint: endpoint.id, chunk, total, received: records.length },
          'Chunk ended short of the reported total',
        );
        return null;
      }
    }

    this.log.warn(
      { endpoint: endpoint.id, chunk, maxPagesPerChunk, total, received: records.length },
      'Chunk still had records at the page limit; narrow the safe span',
    );
    return null;
  }
}

/** The caller's span when it is narrower than the endpoint's, else the endpoint's. */
export function narrowerSpan(safeSpan: Duration, override: Duration | undefined): Duration {
  if (!override) return safeSpan;
  return override.toMillis() < safeSpan.toMillis() ? override : safeSpan;
}

export function summarizeIngestion(result: IngestionResult): IngestionSummary {
  return {
    health: result.health,
    failedIntervalCount: result.failedIntervals.length,
    recordCount: result.records.length,
  };
}
