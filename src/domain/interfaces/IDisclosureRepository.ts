/**
 * Disclosure Repository Interface — the record cache contract
 * Layer: Domain
 * Pattern: Repository
 *
 * The ingestion core never persists anything. This is the collaborator
 * IngestionService hands a finished run to, and the place it reads previously
 * ingested records from when a run comes back unhealthy.
 */
import type { DateInterval } from '@domain/entities/DateInterval';
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';

export interface IDisclosureRepository {
  /** Insert or update records keyed by ADA code. Returns the number of rows written. */
  upsertMany(records: DisclosureRecord[]): Promise<number>;

  /** Cached records whose issue date falls in [start, end), ordered by issue date then ADA. */
  findByIssueDateRange(interval: DateInterval): Promise<DisclosureRecord[]>;
}
