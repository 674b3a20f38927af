/** Query-string parameter names of the upstream search API. */
export const WIRE_PARAMS = {
  QUERY: 'q',
  FILTER_QUERY: 'fq',
  FORMAT: 'wt',
  PAGE: 'page',
  SIZE: 'size',
  SORT: 'sort',
} as const;

/** Query that matches everything; used by the maintenance probe. */
export const WILDCARD_QUERY = '*:*';

export const DEFAULT_SORT = 'recent';

/** Keys under which the upstream has been seen to return a paged decision list. */
export const PAGED_LIST_KEYS = ['decisionResultList', 'decisions', 'diavgeia_decisions'] as const;

/** Envelope keys wrapping a `decision`/`decisions` member. */
export const ENVELOPE_KEYS = ['decisionResults', 'decisionresults'] as const;
export const ENVELOPE_ITEM_KEYS = ['decision', 'decisions'] as const;

/** Root and item element names of the XML export document. */
export const XML_ROOT_ELEMENTS = ['decisionResults', 'decisionResultList'] as const;
export const XML_ITEM_ELEMENT = 'decision';

/** Fields of a 200 body that mark it as a structured query error. */
export const ERROR_NAME_FIELDS = ['exception', 'exceptionName', 'error'] as const;
export const ERROR_MESSAGE_FIELD = 'message';

/** Local timestamp format of the export API ("15/01/2024 10:00:00"). */
export const UPSTREAM_DATE_FORMAT = 'dd/MM/yyyy HH:mm:ss';
/** Format of the DT(...) bounds in range clauses. */
export const QUERY_DATE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
