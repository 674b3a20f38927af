/**
 * XML export document:
 *
 *   <decisionResults>
 *     <total>1</total>
 *     <decision>
 *       <ada>ΨΑΑ1ΩΡΦ-1ΑΒ</ada>
 *       <issueDate>2024-01-15T10:00:00+02:00</issueDate>
 *       <organizationId>99220018</organizationId>
 *       <decisionTypeId>Β.1.3</decisionTypeId>
 *     </decision>
 *   </decisionResults>
 *
 * Only `decision` children of a known root are items; leaf children become
 * raw fields by element name. A root with no `decision` child is an empty
 * page only when its `<total>` is 0 or missing and it has no other non-leaf
 * child.
 */
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import type {
  ExtractedPage,
  IResponseShapeAdapter,
  ParsedPayload,
  XmlElement,
} from '@domain/interfaces/IResponseShapeAdapter';
import { XML_ITEM_ELEMENT, XML_ROOT_ELEMENTS } from '@shared/constants';
import { SchemaError } from '@shared/errors/IngestionError';

import { firstText, type JsonObject, readTotal, toDisclosureRecord } from './fieldMapping';

const KNOWN_ROOTS: readonly string[] = XML_ROOT_ELEMENTS;
const TOTAL_ELEMENT = 'total';

export class XmlExportAdapter implements IResponseShapeAdapter {
  readonly shape = 'xml-export' as const;

  constructor(private readonly timezone: string) {}

  extract(payload: ParsedPayload): ExtractedPage | null {
    if (payload.format !== 'xml' || !KNOWN_ROOTS.includes(payload.root.name)) return null;

    const { children } = payload.root;
    const totalElement = children.find((child) => child.name === TOTAL_ELEMENT);
    const total = totalElement ? readTotal(totalElement.text) : undefined;
    const decisions = children.filter((child) => child.name === XML_ITEM_ELEMENT);

    if (decisions.length === 0) {
      const containers = children.filter((child) => child.children.length > 0);
      if (containers.length > 0 || (total ?? 0) > 0) {
        const names = [...new Set(children.map((child) => child.name))];
        throw new SchemaError(
          `${this.shape} has no <${XML_ITEM_ELEMENT}> elements ` +
            `(children [${names.join(', ')}]${total !== undefined ? `, total ${total}` : ''})`,
        );
      }
    }

    return { records: decisions.map((decision, index) => this.toRecord(decision, index)), total };
  }

  private toRecord(decision: XmlElement, index: number): DisclosureRecord {
    const fields = leafFields(decision);
    return toDisclosureRecord(
      this.shape,
      index,
      {
        adaCode: firstText(fields, ['ada']),
        issueDate: fields.issueDate,
        organizationId: firstText(fields, ['organizationId', 'organizationUid']),
        subjectCode: firstText(fields, ['decisionTypeId', 'decisionTypeUid']),
      },
      fields,
      this.timezone,
    );
  }
}

function leafFields(element: XmlElement): JsonObject {
  const fields: JsonObject = { ...element.attributes };
  for (const child of element.children) {
    if (child.children.length === 0) {
      fields[child.name] = child.text;
    }
  }
  return fields;
}
