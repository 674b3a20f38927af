/**
 * Chunk Result Collector
 * Layer: Application
 *
 * Workers finish chunks in any order; the collector keeps each chunk's page
 * records together and only orders them at the end. Output order is chunk
 * start order, then upstream order within the chunk, and the first occurrence
 * of an ADA code wins. A chunk either contributes all of its pages or is
 * reported as failed, never both.
 */
import { compareIntervals, type DateInterval } from '@domain/entities/DateInterval';
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';

interface CompletedChunk {
  interval: DateInterval;
  records: DisclosureRecord[];
}

export interface CollectedResult {
  records: DisclosureRecord[];
  failedIntervals: DateInterval[];
}

export class ChunkResultCollector {
  private readonly completed: CompletedChunk[] = [];
  private readonly failed: DateInterval[] = [];
  private readonly adaCodes = new Set<string>();

  add(interval: DateInterval, records: DisclosureRecord[]): void {
    this.completed.push({ interval, records });
    records.forEach((record) => this.adaCodes.add(record.adaCode));
  }

  /** Distinct ADA codes collected so far. */
  get recordCount(): number {
    return this.adaCodes.size;
  }

  fail(interval: DateInterval): void {
    this.failed.push(interval);
  }

  finish(): CollectedResult {
    const ordered = [...this.completed].sort((a, b) => compareIntervals(a.interval, b.interval));
    return {
      records: dedupeByAdaCode(ordered.flatMap((chunk) => chunk.records)),
      failedIntervals: [...this.failed].sort(compareIntervals),
    };
  }
}

export function dedupeByAdaCode(records: readonly DisclosureRecord[]): DisclosureRecord[] {
  const seen = new Set<string>();
  const unique: DisclosureRecord[] = [];
  for (const record of records) {
    if (seen.has(record.adaCode)) continue;
    seen.add(record.adaCode);
    unique.push(record);
  }
  return unique;
}
