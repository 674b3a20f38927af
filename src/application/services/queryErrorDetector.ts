/**
 * Structured query-error detection.
 *
 * The upstream reports a rejected query (and maintenance mode) inside an HTTP
 * 200 body: a JSON object with an exception-name field plus a `message`, or,
 * in XML and other bodies, the bare exception identifier. Returns a detail
 * string when the body is such an error, otherwise null.
 */
import { ERROR_MESSAGE_FIELD, ERROR_NAME_FIELDS } from '@shared/constants';

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

export function detectQueryError(body: string, signature: string): string | null {
  const trimmed = body.trim();

  if (trimmed.startsWith('{')) {
    const parsed = tryParseJson(trimmed);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      const fields = new Map(Object.entries(parsed));
      const message = fields.get(ERROR_MESSAGE_FIELD);
      const name = ERROR_NAME_FIELDS.map((key) => fields.get(key)).find(
        (value): value is string => typeof value === 'string' && value.length > 0,
      );
      if (name !== undefined && typeof message === 'string') {
        return `${name}: ${message}`;
      }
    }
  }

  if (trimmed.includes(signature)) {
    return `${signature} found in response body`;
  }
  return null;
}
