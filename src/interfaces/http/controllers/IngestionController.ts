/**
 * Ingestion Controller — HTTP Trigger for an Ingestion Run
 * Layer: Interfaces (HTTP)
 *
 * The body has already been validated and turned into a DateInterval plus run
 * options (limit, span, enrichment) by the `validate` middleware; the
 * controller only bridges HTTP ↔ Application.
 *
 * A run can take minutes. If the client goes away before the response is
 * written, the run is cancelled: chunks already in flight finish, the rest
 * are reported as failed.
 *
 * The response always carries `health`. An empty `records` array with
 * `health: "maintenance"` means "upstream unavailable", not "no decisions";
 * `fallbackRecords` then holds what the cache had for the window.
 */
import { IngestionService } from '@application/services/IngestionService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { describeInterval } from '@domain/entities/DateInterval';
import type { Request, Response } from 'express';

import type { IngestRequest } from '../schemas/ingestRequest';

export class IngestionController {
  private service: IngestionService;

  constructor() {
    this.service = container.resolve<IngestionService>(TOKENS.IngestionService);
  }

  ingest = async (req: Request, res: Response): Promise<void> => {
    const startedAt = Date.now();
    const { interval, filters, options }: IngestRequest = req.body;

    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) abort.abort();
    });

    const { result, summary, storedCount, fallbackRecords } = await this.service.ingest(
      interval,
      filters,
      { ...options, signal: abort.signal },
    );

    res.status(200).json({
      status: 'success',
      data: {
        window: describeInterval(interval),
        health: result.health,
        cancelled: result.cancelled,
        limitReached: result.limitReached,
        summary,
        storedCount,
        failedIntervals: result.failedIntervals,
        records: result.records,
        fallbackRecords,
      },
      meta: { totalTimeMs: Date.now() - startedAt },
    });
  };
}
