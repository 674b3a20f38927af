/**
 * Field helpers shared by the response shape adapters.
 *
 * Upstream dates come in three encodings: epoch time (a number, or a digit
 * string of 13+ digits for milliseconds and exactly 10 for seconds), the export
 * API's local "dd/MM/yyyy HH:mm:ss", and ISO-8601. Local forms are read in the
 * source zone. Other digit runs are rejected rather than landed in 1970.
 */
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import type { ShapeName } from '@domain/interfaces/IResponseShapeAdapter';
import { UPSTREAM_DATE_FORMAT } from '@shared/constants';
import { SchemaError } from '@shared/errors/IngestionError';
import { DateTime } from 'luxon';

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

/** First key holding a non-empty string (or number). */
export function firstText(source: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const text = asText(source[key]);
    if (text !== undefined) return text;
  }
  return undefined;
}

/** Reads `source.parent.child` when `parent` is an object. */
export function nestedText(source: JsonObject, parent: string, child: string): string | undefined {
  const nested = source[parent];
  return isJsonObject(nested) ? asText(nested[child]) : undefined;
}

export function parseIssueDate(value: unknown, timezone: string): Date | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Date(value) : undefined;
  }
  if (typeof value !== 'string') return undefined;

  const text = value.trim();
  let parsed: DateTime;
  if (/^\d{13,}$/.test(text)) {
    parsed = DateTime.fromMillis(Number(text), { zone: timezone });
  } else if (/^\d{10}$/.test(text)) {
    parsed = DateTime.fromSeconds(Number(text), { zone: timezone });
  } else if (/^\d+$/.test(text)) {
    return undefined;
  } else if (/^\d{2}\/\d{2}\/\d{4}/.test(text)) {
    parsed = DateTime.fromFormat(text, UPSTREAM_DATE_FORMAT, { zone: timezone });
    if (!parsed.isValid) parsed = DateTime.fromFormat(text, 'dd/MM/yyyy', { zone: timezone });
  } else {
    parsed = DateTime.fromISO(text, { zone: timezone });
  }
  return parsed.isValid ? parsed.toJSDate() : undefined;
}

/** A result count as the upstream reports it: a non-negative integer or digit string. */
export function readTotal(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isInteger(value) && value >= 0 ? value : undefined;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
}

export interface MappedFields {
  adaCode: string | undefined;
  issueDate: unknown;
  organizationId: string | undefined;
  subjectCode: string | undefined;
}

/**
 * Builds the record or throws: a recognised shape with an item that has no ADA
 * code or no readable issue date means the mapping is stale.
 */
export function toDisclosureRecord(
  shape: ShapeName,
  index: number,
  fields: MappedFields,
  rawFields: JsonObject,
  timezone: string,
): DisclosureRecord {
  if (!fields.adaCode) {
    throw new SchemaError(`${shape} item ${index} has no ADA code`);
  }
  const issueDate = parseIssueDate(fields.issueDate, timezone);
  if (!issueDate) {
    throw new SchemaError(
      `${shape} item ${index} (${fields.adaCode}) has an unreadable issue date: ${String(fields.issueDate)}`,
    );
  }
  return {
    adaCode: fields.adaCode,
    issueDate,
    organizationId: fields.organizationId ?? '',
    subjectCode: fields.subjectCode ?? '',
    rawFields,
  };
}
