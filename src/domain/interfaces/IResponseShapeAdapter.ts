import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';

export type ShapeName = 'json-paged-list' | 'json-envelope' | 'xml-export';

/** Minimal element tree produced from an XML body. */
export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
}

/**
 * A response body after syntax-level parsing, before any shape is assumed.
 * Detection runs on this structure, never on which endpoint answered.
 */
export type ParsedPayload =
  | { format: 'json'; value: unknown }
  | { format: 'xml'; root: XmlElement }
  | { format: 'unparseable'; preview: string };

/**
 * One page after extraction. `total` is the result count the upstream reports
 * for the whole query, when the shape carries one.
 */
export interface ExtractedPage {
  records: DisclosureRecord[];
  total?: number;
}

/**
 * Response Shape Adapter
 * Layer: Domain
 * Pattern: Adapter (one per known response shape)
 *
 * `extract` returns null when the payload is not this adapter's shape, so the
 * extractor can try the next one; once a shape is recognised it either maps
 * every item or throws a SchemaError. There is no "best effort" mode: a
 * recognised wrapper whose items sit under an unknown member is an error, not
 * an empty page.
 */
export interface IResponseShapeAdapter {
  readonly shape: ShapeName;
  extract(payload: ParsedPayload): ExtractedPage | null;
}
