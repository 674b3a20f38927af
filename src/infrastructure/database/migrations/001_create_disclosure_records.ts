/**
 * Migration 001 — Create the `disclosure_records` Table
 * Layer: Infrastructure (Database)
 *
 * One row per ADA code: the cache IngestionService writes finished runs into
 * and reads from when the upstream is in maintenance.
 *
 *   - `ada_code` is UNIQUE; re-ingesting a window upserts on it.
 *   - `issue_date` is indexed because every read is a date-range scan.
 *   - `raw_fields` keeps the upstream object as JSONB for reporting.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('disclosure_records', (table) => {
    table.increments('id').primary();
    table.string('ada_code', 64).notNullable().unique();
    table.timestamp('issue_date', { useTz: true }).notNullable();
    table.string('organization_id', 64).notNullable();
    table.string('subject_code', 64).notNullable();
    table.jsonb('raw_fields').notNullable().defaultTo('{}');

    table.timestamps(true, true);

    table.index('issue_date', 'idx_disclosure_records_issue_date');
    table.index('organization_id', 'idx_disclosure_records_organization');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('disclosure_records');
}
