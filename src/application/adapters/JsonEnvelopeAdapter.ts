/**
 * JSON envelope — results wrapped one level deeper, with a single decision
 * collapsed to an object:
 *
 *   { "decisionResults": { "total": 2, "decision": [ ... ] } }
 *   { "decisionresults": { "decision": { ... } } }
 *
 * Items in this shape carry organization and decision type as nested
 * objects ({ "organization": { "uid": ... } }) as well as flat ids.
 *
 * An envelope without a `decision` member is an empty page only when nothing
 * else in it could be holding items: no object or array member, and a total
 * that is 0 or absent.
 */
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import type {
  ExtractedPage,
  IResponseShapeAdapter,
  ParsedPayload,
} from '@domain/interfaces/IResponseShapeAdapter';
import { ENVELOPE_ITEM_KEYS, ENVELOPE_KEYS } from '@shared/constants';
import { SchemaError } from '@shared/errors/IngestionError';

import {
  firstText,
  isJsonObject,
  type JsonObject,
  nestedText,
  readTotal,
  toDisclosureRecord,
} from './fieldMapping';

export class JsonEnvelopeAdapter implements IResponseShapeAdapter {
  readonly shape = 'json-envelope' as const;

  constructor(private readonly timezone: string) {}

  extract(payload: ParsedPayload): ExtractedPage | null {
    if (payload.format !== 'json' || !isJsonObject(payload.value)) return null;
    const envelope = findEnvelope(payload.value);
    if (envelope === null) return null;

    const total = readTotal(envelope.total);
    const records = this.unwrapItems(envelope, total).map((item, index) =>
      toDisclosureRecord(
        this.shape,
        index,
        {
          adaCode: firstText(item, ['ada']),
          issueDate: item.issueDate,
          organizationId:
            nestedText(item, 'organization', 'uid') ??
            firstText(item, ['organizationId', 'organizationUid']),
          subjectCode:
            nestedText(item, 'decisionType', 'uid') ??
            firstText(item, ['decisionTypeId', 'decisionTypeUid', 'type']),
        },
        item,
        this.timezone,
      ),
    );
    return { records, total };
  }

  private unwrapItems(envelope: JsonObject, total: number | undefined): JsonObject[] {
    for (const key of ENVELOPE_ITEM_KEYS) {
      const member = envelope[key];
      if (member === undefined || member === null) continue;
      const items: unknown[] = Array.isArray(member) ? member : [member];
      return items.map((item, index) => {
        if (!isJsonObject(item)) {
          throw new SchemaError(`${this.shape} item ${index} is not an object`);
        }
        return item;
      });
    }

    const keys = Object.keys(envelope);
    const containers = keys.filter((key) => typeof envelope[key] === 'object' && envelope[key] !== null);
    if (containers.length > 0 || (total ?? 0) > 0) {
      throw new SchemaError(
        `${this.shape} has no ${ENVELOPE_ITEM_KEYS.join('/')} member ` +
          `(keys [${keys.join(', ')}]${total !== undefined ? `, total ${total}` : ''})`,
      );
    }
    return [];
  }
}

function findEnvelope(value: JsonObject): JsonObject | null {
  for (const key of ENVELOPE_KEYS) {
    const candidate = value[key];
    if (isJsonObject(candidate)) return candidate;
  }
  return null;
}
