/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * The three upstream response shapes, each carrying the SAME two decisions,
 * so extractor tests can assert that every shape maps to identical records.
 * Dates are fixed; local times are Europe/Athens (UTC+2 in January).
 *
 *   AB12CD34-001  15/01/2024 10:00:00 local = 2024-01-15T08:00:00Z
 *   AB12CD34-002  20/01/2024 09:30:00 local = 2024-01-20T07:30:00Z
 */
import type { DisclosureRecord } from '@domain/entities/DisclosureRecord';

export const TEST_TIMEZONE = 'Europe/Athens';

export const MAINTENANCE_SIGNATURE = 'org.apache.solr.search.SyntaxError';

/** The normalized view of the two fixture decisions (rawFields left out). */
export const expectedFixtureRecords = [
  {
    adaCode: 'AB12CD34-001',
    issueDate: '2024-01-15T08:00:00.000Z',
    organizationId: '99220018',
    subjectCode: 'Β.1.3',
  },
  {
    adaCode: 'AB12CD34-002',
    issueDate: '2024-01-20T07:30:00.000Z',
    organizationId: '50001',
    subjectCode: 'Δ.1',
  },
];

/** Paged list keyed by `decisionResultList`, epoch-millisecond dates, flat ids. */
export const pagedListBody = JSON.stringify({
  info: { total: 2, page: 0, size: 500 },
  decisionResultList: [
    {
      ada: 'AB12CD34-001',
      subject: 'Έγκριση δαπάνης',
      issueDate: 1705305600000,
      organizationId: '99220018',
      decisionTypeId: 'Β.1.3',
    },
    {
      ada: 'AB12CD34-002',
      subject: 'Ανάθεση έργου',
      issueDate: 1705735800000,
      organizationUid: '50001',
      type: 'Δ.1',
    },
  ],
});

/** Envelope with local "dd/MM/yyyy HH:mm:ss" dates and nested organization/type. */
export const envelopeBody = JSON.stringify({
  decisionResults: {
    total: 2,
    decision: [
      {
        ada: 'AB12CD34-001',
        issueDate: '15/01/2024 10:00:00',
        organization: { uid: '99220018', label: 'Δήμος Αθηναίων' },
        decisionType: { uid: 'Β.1.3' },
      },
      {
        ada: 'AB12CD34-002',
        issueDate: '20/01/2024 09:30:00',
        organization: { uid: '50001' },
        decisionTypeId: 'Δ.1',
      },
    ],
  },
});

/** XML export document with ISO dates carrying an offset. */
export const xmlExportBody = `<?xml version="1.0" encoding="UTF-8"?>
<decisionResults>
  <total>2</total>
  <decision>
    <ada>AB12CD34-001</ada>
    <issueDate>2024-01-15T10:00:00+02:00</issueDate>
    <organizationId>99220018</organizationId>
    <decisionTypeId>Β.1.3</decisionTypeId>
  </decision>
  <decision>
    <ada>AB12CD34-002</ada>
    <issueDate>2024-01-20T09:30:00+02:00</issueDate>
    <organizationId>50001</organizationId>
    <decisionTypeId>Δ.1</decisionTypeId>
  </decision>
</decisionResults>`;

/** What the upstream returns with HTTP 200 while in maintenance. */
export const maintenanceBody = JSON.stringify({
  exception: MAINTENANCE_SIGNATURE,
  message: "Cannot parse '*:*': Encountered \"<EOF>\"",
});

export const emptyPageBody = JSON.stringify({ decisionResultList: [] });

/** A cached record as the repository would return it. */
export const sampleCachedRecord: DisclosureRecord = {
  adaCode: 'CACHED-001',
  issueDate: new Date('2024-01-10T09:00:00.000Z'),
  organizationId: '99220018',
  subjectCode: 'Β.1.3',
  rawFields: { ada: 'CACHED-001' },
};
