/**
 * Ingest CLI Script — one run from the terminal or a cron job
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run ingest -- [--month YYYY-MM | --from DATE --to DATE]
 *                     [--org UID] [--type CODE] [--keyword TEXT]
 *                     [--output file.jsonl] [--store] [--migrate]
 *                     [--limit N] [--span P7D | --chunk-by-day] [--enrich]
 *
 * Without a window it ingests the previous calendar month, which is what the
 * monthly digest job wants. Records go to a JSON-lines file (one decision per
 * line). With --store the run goes through IngestionService instead, so
 * records are also upserted into the cache and, on an unhealthy run, the
 * cached records for the window are written to a second file.
 *
 * Exit codes: 0 healthy, 2 finished but not healthy, 1 failed.
 */
import 'reflect-metadata';

import fs from 'node:fs';
import path from 'node:path';

import type { IngestionOrchestrator } from '@application/services/IngestionOrchestrator';
import { summarizeIngestion } from '@application/services/IngestionOrchestrator';
import type { IngestionService } from '@application/services/IngestionService';
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { describeInterval } from '@domain/entities/DateInterval';
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import { destroyDbConnection, getDbConnection } from '@infrastructure/database/connection';
import type { IngestionReport, RunOptions } from '@shared/types';
import { DateTime } from 'luxon';

import { parseIngestArgs } from './ingestArgs';

const EXIT_UNHEALTHY = 2;

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function localDay(date: Date): string {
  return DateTime.fromJSDate(date, { zone: config.upstream.timezone }).toFormat('yyyy-MM-dd');
}

function writeJsonLines(file: string, records: readonly DisclosureRecord[]): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  const lines = records.map((record) => JSON.stringify(record));
  fs.writeFileSync(file, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf8');
}

async function main(): Promise<number> {
  // eslint-disable-next-line no-console
  const log = console.log;
  const options = parseIngestArgs(process.argv.slice(2), new Date(), config.upstream.timezone);
  const { interval, filters } = options;

  const output = path.resolve(
    options.output ??
      path.join(
        config.ingest.outputDir,
        `disclosures_${localDay(interval.start)}_${localDay(interval.end)}.jsonl`,
      ),
  );

  log('');
  log(`  Window:     ${describeInterval(interval)} (${config.upstream.timezone})`);
  log(`  Filters:    ${Object.keys(filters).length > 0 ? JSON.stringify(filters) : '(none)'}`);
  log(`  Output:     ${output}`);
  if (options.limit !== undefined) log(`  Limit:      ${options.limit}`);
  if (options.maxSpan) log(`  Span:       ${options.maxSpan.toISO()} (when narrower than the endpoint's)`);
  if (options.enrich) log('  Enrich:     metadata documents');
  log('');

  if (options.migrate) {
    log('  Running migrations...');
    await getDbConnection().migrate.latest({
      directory: path.resolve(__dirname, '../infrastructure/database/migrations'),
    });
    log('  Migrations complete.');
  }

  const runOptions: RunOptions = {
    enrich: options.enrich,
    limit: options.limit,
    maxSpan: options.maxSpan,
  };

  const abort = new AbortController();
  process.once('SIGINT', () => {
    log('  Interrupted: finishing in-flight chunks...');
    abort.abort();
  });

  const startTime = Date.now();
  let report: IngestionReport;
  if (options.store) {
    const service = container.resolve<IngestionService>(TOKENS.IngestionService);
    report = await service.ingest(interval, filters, { ...runOptions, signal: abort.signal });
  } else {
    const orchestrator = container.resolve<IngestionOrchestrator>(TOKENS.IngestionOrchestrator);
    const result = await orchestrator.run(interval, filters, {
      ...runOptions,
      signal: abort.signal,
    });
    report = { result, summary: summarizeIngestion(result), storedCount: 0, fallbackRecords: [] };
  }

  const { result, summary } = report;
  writeJsonLines(output, result.records);

  log(`  Health:     ${summary.health}${result.cancelled ? ' (cancelled)' : ''}`);
  log(`  Records:    ${summary.recordCount}${result.limitReached ? ' (limit reached)' : ''}`);
  if (options.store) log(`  Stored:     ${report.storedCount}`);
  log(`  Duration:   ${formatDuration(Date.now() - startTime)}`);

  if (summary.health !== 'healthy') {
    log('');
    log(`  ! Upstream data incomplete: ${summary.failedIntervalCount} interval(s) not fetched`);
    for (const failed of result.failedIntervals) {
      log(`      ${describeInterval(failed)}`);
    }
    if (report.fallbackRecords.length > 0) {
      const cachedFile = output.replace(/\.jsonl$/, '') + '.cached.jsonl';
      writeJsonLines(cachedFile, report.fallbackRecords);
      log(`  Cached:     ${report.fallbackRecords.length} record(s) → ${cachedFile}`);
    }
  }
  log('');

  return summary.health === 'healthy' ? 0 : EXIT_UNHEALTHY;
}

main()
  .then(async (code) => {
    await destroyDbConnection();
    process.exit(code);
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Ingestion failed:', err);
    process.exit(1);
  });
