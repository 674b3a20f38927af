/**
 * PostgreSQL Disclosure Repository
 * Layer: Infrastructure
 * Pattern: Repository (implements IDisclosureRepository)
 *
 * Upserts go out in slices so a large month never builds one statement past
 * PostgreSQL's bind-parameter limit; each slice merges on ada_code so
 * re-running a window refreshes rows instead of duplicating them.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { DateInterval } from '@domain/entities/DateInterval';
import type { DisclosureRecord, DisclosureRecordRow } from '@domain/entities/DisclosureRecord';
import type { IDisclosureRepository } from '@domain/interfaces/IDisclosureRepository';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

const TABLE = 'disclosure_records';

/** PostgreSQL max bind parameters per query. */
const PG_MAX_BIND_PARAMS = 65535;
const RECORD_COLS = 5;
const MAX_ROWS_PER_INSERT = Math.min(1000, Math.floor((PG_MAX_BIND_PARAMS - 1) / RECORD_COLS));

interface StoredDisclosureRow {
  ada_code: string;
  issue_date: Date | string;
  organization_id: string;
  subject_code: string;
  raw_fields: unknown;
}

@injectable()
export class PostgresDisclosureRepository implements IDisclosureRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async upsertMany(records: DisclosureRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const rows = records.map(toRow);
    await this.db.transaction(async (trx) => {
      for (let i = 0; i < rows.length; i += MAX_ROWS_PER_INSERT) {
        await trx(TABLE)
          .insert(rows.slice(i, i + MAX_ROWS_PER_INSERT))
          .onConflict('ada_code')
          .merge(['issue_date', 'organization_id', 'subject_code', 'raw_fields', 'updated_at']);
      }
    });

    this.log.debug({ count: rows.length }, 'upsertMany complete');
    return rows.length;
  }

  async findByIssueDateRange(interval: DateInterval): Promise<DisclosureRecord[]> {
    const rows: StoredDisclosureRow[] = await this.db(TABLE)
      .select('ada_code', 'issue_date', 'organization_id', 'subject_code', 'raw_fields')
      .where('issue_date', '>=', interval.start)
      .andWhere('issue_date', '<', interval.end)
      .orderBy([
        { column: 'issue_date', order: 'asc' },
        { column: 'ada_code', order: 'asc' },
      ]);

    return rows.map(toDomain);
  }
}

function toRow(record: DisclosureRecord): DisclosureRecordRow {
  return {
    ada_code: record.adaCode,
    issue_date: record.issueDate,
    organization_id: record.organizationId,
    subject_code: record.subjectCode,
    raw_fields: JSON.stringify(record.rawFields),
  };
}

function toDomain(row: StoredDisclosureRow): DisclosureRecord {
  return {
    adaCode: row.ada_code,
    issueDate: row.issue_date instanceof Date ? row.issue_date : new Date(row.issue_date),
    organizationId: row.organization_id,
    subjectCode: row.subject_code,
    rawFields: isPlainObject(row.raw_fields) ? row.raw_fields : {},
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
