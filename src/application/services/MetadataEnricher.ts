/**
 * Metadata Enricher
 * Layer: Application
 *
 * Optional pass after a run: each decision's metadata document
 * (`{metadataUrl}/{ada}`) is fetched through the RetryingFetcher and merged
 * over the record's `rawFields`, metadata keys winning. Search hits carry a
 * subset of the document, so nothing the hit had is lost.
 *
 * A record whose document is missing, rejected or not a JSON object stays as
 * the search returned it. Output order is input order. Once the signal aborts,
 * no further documents are requested and the rest of the records pass through
 * unchanged.
 */
import { isJsonObject, type JsonObject } from '@application/adapters/fieldMapping';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import { QuerySyntaxError, TransportError } from '@shared/errors/IngestionError';
import { inject, injectable } from 'tsyringe';

import { tryParseJson } from './queryErrorDetector';
import { RetryingFetcher } from './RetryingFetcher';

export interface EnrichmentSettings {
  /** Base URL of the per-decision documents, without a trailing ADA. */
  metadataUrl: string;
  concurrency: number;
}

/** Label the fetcher puts in TransportErrors and retry logs. */
export const METADATA_SOURCE = 'metadata';

@injectable()
export class MetadataEnricher {
  constructor(
    @inject(TOKENS.RetryingFetcher) private fetcher: RetryingFetcher,
    @inject(TOKENS.EnrichmentSettings) private settings: EnrichmentSettings,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async enrich(
    records: readonly DisclosureRecord[],
    signal?: AbortSignal,
  ): Promise<DisclosureRecord[]> {
    const enriched = [...records];
    let next = 0;
    let missing = 0;

    const worker = async (): Promise<void> => {
      while (!signal?.aborted) {
        const index = next;
        const record = records[index];
        if (!record) return;
        next += 1;

        const metadata = await this.fetchMetadata(record.adaCode);
        if (metadata) {
          enriched[index] = { ...record, rawFields: { ...record.rawFields, ...metadata } };
        } else {
          missing += 1;
        }
      }
    };

    const workers = Math.max(1, Math.min(this.settings.concurrency, records.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    this.log.info(
      { records: records.length, requested: next, missing, cancelled: signal?.aborted ?? false },
      'Metadata enrichment finished',
    );
    return enriched;
  }

  documentUrl(adaCode: string): string {
    return `${this.settings.metadataUrl.replace(/\/+$/, '')}/${encodeURIComponent(adaCode)}`;
  }

  private async fetchMetadata(adaCode: string): Promise<JsonObject | null> {
    let body: string;
    try {
      ({ body } = await this.fetcher.fetchDocument(this.documentUrl(adaCode), METADATA_SOURCE));
    } catch (err) {
      if (err instanceof TransportError || err instanceof QuerySyntaxError) {
        this.log.warn({ adaCode, err: err.message }, 'Metadata unavailable, keeping search fields');
        return null;
      }
      throw err;
    }

    const document = tryParseJson(body);
    if (!isJsonObject(document)) {
      this.log.warn({ adaCode }, 'Metadata document is not a JSON object, keeping search fields');
      return null;
    }
    return document;
  }
}
