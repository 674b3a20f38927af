/**
 * JSON paged list — a bare array of decisions, or an object carrying the
 * current page under one of the known list keys:
 *
 *   [ { "ada": "...", ... } ]
 *   { "decisionResultList": [ ... ], "info": { "total": 250, ... } }
 *
 * The query's result count is read from `info.total` (or a top-level `total`).
 */
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import type {
  ExtractedPage,
  IResponseShapeAdapter,
  ParsedPayload,
} from '@domain/interfaces/IResponseShapeAdapter';
import { PAGED_LIST_KEYS } from '@shared/constants';
import { SchemaError } from '@shared/errors/IngestionError';

import { firstText, isJsonObject, readTotal, toDisclosureRecord } from './fieldMapping';

export class JsonPagedListAdapter implements IResponseShapeAdapter {
  readonly shape = 'json-paged-list' as const;

  constructor(private readonly timezone: string) {}

  extract(payload: ParsedPayload): ExtractedPage | null {
    if (payload.format !== 'json') return null;
    const items = findPagedList(payload.value);
    if (items === null) return null;

    return {
      records: items.map((item, index) => this.toRecord(item, index)),
      total: findTotal(payload.value),
    };
  }

  private toRecord(item: unknown, index: number): DisclosureRecord {
    if (!isJsonObject(item)) {
      throw new SchemaError(`${this.shape} item ${index} is ${describeValue(item)}, not an object`);
    }
    return toDisclosureRecord(
      this.shape,
      index,
      {
        adaCode: firstText(item, ['ada']),
        issueDate: item.issueDate,
        organizationId: firstText(item, ['organizationUid', 'organizationId']),
        subjectCode: firstText(item, ['decisionTypeUid', 'decisionTypeId', 'type']),
      },
      item,
      this.timezone,
    );
  }
}

function findPagedList(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (!isJsonObject(value)) return null;
  for (const key of PAGED_LIST_KEYS) {
    const candidate = value[key];
    if (Array.isArray(candidate)) return candidate;
  }
  return null;
}

function findTotal(value: unknown): number | undefined {
  if (!isJsonObject(value)) return undefined;
  const info = value.info;
  return (isJsonObject(info) ? readTotal(info.total) : undefined) ?? readTotal(value.total);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'an array' : typeof value;
}
