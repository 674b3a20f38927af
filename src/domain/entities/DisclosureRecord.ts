/**
 * Disclosure Record — the normalized decision
 * Layer: Domain
 *
 *   DisclosureRecord     camelCase, what extraction produces and the rest of
 *                        the app passes around.
 *   DisclosureRecordRow  snake_case, mirrors the disclosure_records table.
 *
 * `adaCode` is the upstream's public identifier; it is unique within one run
 * and the conflict key in the cache table. `rawFields` keeps the upstream
 * object untouched for downstream reporting.
 */
export interface DisclosureRecord {
  adaCode: string;
  issueDate: Date;
  organizationId: string;
  subjectCode: string;
  rawFields: Record<string, unknown>;
}

export interface DisclosureRecordRow {
  ada_code: string;
  issue_date: Date;
  organization_id: string;
  subject_code: string;
  raw_fields: string;
}
