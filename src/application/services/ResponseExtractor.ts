/**
 * Response Extractor
 * Layer: Application
 * Pattern: Chain of adapters
 *
 * Turns one raw page into DisclosureRecords. The body is parsed by its own
 * syntax (a leading `{`/`[` is JSON, a leading `<` is XML) and then offered to
 * each shape adapter in turn. The content-type header and the endpoint that
 * answered are ignored: the upstream has been seen to serve XML as
 * application/json and vice versa.
 *
 * No adapter claims the payload → SchemaError with a short description of
 * what was actually observed, so the mapping can be updated.
 */
import { TOKENS } from '@core/types';
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';
import type {
  ExtractedPage,
  IResponseShapeAdapter,
  ParsedPayload,
} from '@domain/interfaces/IResponseShapeAdapter';
import { parseXmlDocument } from '@infrastructure/xml/parseXmlDocument';
import { SchemaError } from '@shared/errors/IngestionError';
import type { RawResponse } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { JsonEnvelopeAdapter } from '../adapters/JsonEnvelopeAdapter';
import { JsonPagedListAdapter } from '../adapters/JsonPagedListAdapter';
import { XmlExportAdapter } from '../adapters/XmlExportAdapter';
import { tryParseJson } from './queryErrorDetector';

const PREVIEW_LENGTH = 80;
const MAX_LISTED_KEYS = 8;

@injectable()
export class ResponseExtractor {
  private readonly adapters: readonly IResponseShapeAdapter[];

  constructor(@inject(TOKENS.SourceTimezone) timezone: string) {
    this.adapters = [
      new JsonPagedListAdapter(timezone),
      new JsonEnvelopeAdapter(timezone),
      new XmlExportAdapter(timezone),
    ];
  }

  extract(raw: RawResponse): DisclosureRecord[] {
    return this.extractPage(raw).records;
  }

  /** Records plus the query's result count, when the shape reports one. */
  extractPage(raw: RawResponse): ExtractedPage {
    const payload = parsePayload(raw.body);
    for (const adapter of this.adapters) {
      const page = adapter.extract(payload);
      if (page !== null) return page;
    }
    throw new SchemaError(describeShape(payload));
  }
}

export function parsePayload(body: string): ParsedPayload {
  const trimmed = body.trim();

  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    const value = tryParseJson(trimmed);
    if (value !== undefined) return { format: 'json', value };
  } else if (trimmed.startsWith('<')) {
    try {
      return { format: 'xml', root: parseXmlDocument(trimmed) };
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      return { format: 'unparseable', preview: `malformed XML (${firstLine(err.message)})` };
    }
  }
  return { format: 'unparseable', preview: preview(trimmed) };
}

export function describeShape(payload: ParsedPayload): string {
  switch (payload.format) {
    case 'json': {
      const value = payload.value;
      if (Array.isArray(value)) return `JSON array of ${value.length}`;
      if (typeof value === 'object' && value !== null) {
        const keys = Object.keys(value);
        const listed = keys.slice(0, MAX_LISTED_KEYS).join(', ');
        return `JSON object with keys [${listed}${keys.length > MAX_LISTED_KEYS ? ', ...' : ''}]`;
      }
      return `JSON ${value === null ? 'null' : typeof value}`;
    }
    case 'xml':
      return `XML document with root <${payload.root.name}>`;
    case 'unparseable':
      return `unparseable body: ${payload.preview}`;
  }
}

function preview(text: string): string {
  if (!text) return '(empty)';
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

function firstLine(text: string): string {
  return text.split('\n')[0] ?? text;
}
