/**
 * Ingestion Service — Facade over a run and its persistence hand-off
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * The orchestrator is a pure function of its inputs: it fetches and returns,
 * and never touches the database. Callers (the HTTP controller, the CLI) want
 * one call that also does the bookkeeping around a run:
 *   - read what the cache already holds for the window, when the run came back
 *     unhealthy, so a report can still be rendered with a "data unavailable"
 *     banner
 *   - upsert whatever the run did fetch
 *   - build the summary for the alerting collaborator
 *
 * Cached records are read before the upsert, so they are exactly what earlier
 * runs stored. The cache lookup always selects by `issue_date`, the only date
 * column of the table, whatever INGEST_DATE_FIELD the upstream query used; a
 * run filtered on submission or publish time gets the decisions *issued* in
 * the window as its fallback.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { DateInterval } from '@domain/entities/DateInterval';
import type { IDisclosureRepository } from '@domain/interfaces/IDisclosureRepository';
import type { IngestionReport, RunOptions, SearchFilters } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { IngestionOrchestrator, summarizeIngestion } from './IngestionOrchestrator';

@injectable()
export class IngestionService {
  constructor(
    @inject(TOKENS.IngestionOrchestrator) private orchestrator: IngestionOrchestrator,
    @inject(TOKENS.DisclosureRepository) private repo: IDisclosureRepository,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async ingest(
    interval: DateInterval,
    filters: SearchFilters = {},
    options: RunOptions = {},
  ): Promise<IngestionReport> {
    const result = await this.orchestrator.run(interval, filters, options);
    const summary = summarizeIngestion(result);

    const fallbackRecords =
      result.health === 'healthy' ? [] : await this.repo.findByIssueDateRange(interval);
    const storedCount = result.records.length > 0 ? await this.repo.upsertMany(result.records) : 0;

    if (result.health !== 'healthy') {
      this.log.warn(
        { ...summary, cachedRecords: fallbackRecords.length },
        'Run incomplete, cached records attached',
      );
    }
    return { result, summary, storedCount, fallbackRecords };
  }
}
