import { describe, expect, it } from 'vitest';

import {
  countRecords,
  extractFiling,
  extractIdFromUrl,
  serializeFiling,
  toFilingJson,
  unparsedDates,
} from '@/modules/extraction/index.js';

import { loadHtmlFixture } from '../../fixtures/html.js';

const REPORT_URL = 'https://filings.example.test/public/report/1234';

describe('extractIdFromUrl', () => {
  it('reads a trailing numeric path segment', () => {
    expect(extractIdFromUrl(REPORT_URL)).toBe('1234');
    expect(extractIdFromUrl('https://filings.example.test/entity/77/?tab=1')).toBe('77');
  });

  it('returns null for other URLs', () => {
    expect(extractIdFromUrl('https://filings.example.test/entity/latest')).toBeNull();
  });
});

describe('extractFiling', () => {
  it('fails on an empty page', () => {
    const result = extractFiling({ kind: 'disclosure_report', html: '' });

    expect(result._unsafeUnwrapErr().type).toBe('EmptyDocument');
  });

  describe('disclosure report', () => {
    const filing = extractFiling({
      kind: 'disclosure_report',
      html: loadHtmlFixture('disclosure-report'),
      sourceUrl: REPORT_URL,
    })._unsafeUnwrap();

    it('carries the id read from the URL', () => {
      expect(filing.kind).toBe('disclosure_report');
      if (filing.kind !== 'disclosure_report') return;

      expect(filing.reportId).toBe('1234');
      expect(filing.sourceUrl).toBe(REPORT_URL);
    });

    it('extracts balances and transactions', () => {
      if (filing.kind !== 'disclosure_report') throw new Error('unexpected kind');

      expect(filing.balances.beginning?.toNumber()).toBe(1000);
      expect(filing.balances.ending?.toNumber()).toBe(2350.5);
      expect(filing.contributions.map((c) => [c.counterparty, c.amount.toNumber()])).toEqual([
        ['Jane Placeholder', 500],
        ['Acme Widgets LLC', 1000],
        ['Sam Example', 650.5],
      ]);
      expect(filing.expenditures.map((e) => [e.counterparty, e.loan])).toEqual([
        ['Print Shop Co', true],
        ['Radio Placeholder', false],
      ]);
    });

    it('summarises the transaction lists', () => {
      if (filing.kind !== 'disclosure_report') throw new Error('unexpected kind');

      expect(filing.summary.contributions.count).toBe(3);
      expect(filing.summary.contributions.amount.toString()).toBe('2150.5');
      expect(filing.summary.expenditures.count).toBe(2);
      expect(filing.summary.expenditures.amount.toString()).toBe('800');
      expect(countRecords(filing)).toBe(5);
    });

    it('lists dates that did not parse', () => {
      expect(unparsedDates(filing)).toEqual(['--', 'sometime in May']);
    });

    it('serializes to snake_case JSON', () => {
      const json = toFilingJson(filing);

      expect(json['report_id']).toBe('1234');
      expect(json['balance_summary']).toEqual({
        'Balance at Beginning of Reporting Period': 1000,
        'Total Contributions Received': 2150.5,
        'Total Expenditures Made': 800,
        'Ending Balance': 2350.5,
      });
      expect(json['summary']).toEqual({
        total_contributions: 3,
        total_contribution_amount: 2150.5,
        total_expenditures: 2,
        total_expenditure_amount: 800,
      });
      expect(json['contributions']).toContainEqual({
        date_received: '2024-02-01',
        date_received_raw: '2/1/2024',
        contributor_name: 'Acme Widgets LLC',
        address: '9 Oak Ave, Boise, ID 83702',
        is_in_kind: true,
        is_loan: false,
        is_amendment: true,
        amount: 1000,
      });
    });
  });

  describe('custom transaction tables', () => {
    const html = `<html><body>
      <table class="legacy">
        <thead><tr>
          <th>Date of Contribution</th> <th>Name</th> <th>Address</th>
          <th>Amendment</th> <th>Loan</th> <th>In Kind</th> <th>Amount</th>
        </tr></thead>
        <tbody><tr>
          <td>3/4/2024</td><td>Pat Sample</td><td>1 Main St, Ogden, UT 84401</td>
          <td></td><td><span class="flag">L</span></td><td></td><td>$75.00</td>
        </tr></tbody>
      </table>
    </body></html>`;

    it('reads tables and flags through the given selectors', () => {
      const filing = extractFiling({
        kind: 'disclosure_report',
        html,
        tables: { tableSelector: 'table.legacy', flagMarker: 'span.flag' },
      })._unsafeUnwrap();

      if (filing.kind !== 'disclosure_report') throw new Error('unexpected kind');
      expect(
        filing.contributions.map((c) => [c.counterparty, c.amount.toNumber(), c.loan, c.inKind])
      ).toEqual([['Pat Sample', 75, true, false]]);
    });

    it('finds nothing with the default selectors', () => {
      const filing = extractFiling({ kind: 'disclosure_report', html })._unsafeUnwrap();

      if (filing.kind !== 'disclosure_report') throw new Error('unexpected kind');
      expect(filing.contributions).toEqual([]);
    });
  });

  it('extracts a lobbyist report', () => {
    const filing = extractFiling({
      kind: 'lobbyist_report',
      html: loadHtmlFixture('lobbyist-report'),
    })._unsafeUnwrap();

    if (filing.kind !== 'lobbyist_report') throw new Error('unexpected kind');
    expect(filing.reportId).toBeNull();
    expect(filing.totalExpenditures?.toNumber()).toBe(165.25);
    expect(filing.expenditures.map((e) => [e.counterparty, e.amendment])).toEqual([
      ['Rep. Placeholder', false],
      ['Sen. Example', true],
    ]);
    expect(filing.summary.expenditures.amount.toNumber()).toBe(165.25);
    expect(toFilingJson(filing)['lobbyist_expenditures']).toHaveLength(2);
  });

  it('uses an explicit id over the URL', () => {
    const filing = extractFiling({
      kind: 'entity_registration',
      html: loadHtmlFixture('entity-registration'),
      sourceUrl: 'https://filings.example.test/entity/view',
      id: '900',
    })._unsafeUnwrap();

    expect(filing.kind === 'entity_registration' && filing.entityId).toBe('900');
  });

  it('extracts a lobbyist registration', () => {
    const filing = extractFiling({
      kind: 'lobbyist_registration',
      html: loadHtmlFixture('lobbyist-registration'),
    })._unsafeUnwrap();

    expect(countRecords(filing)).toBe(2);
    expect(toFilingJson(filing)['name']).toBe('Lee Placeholder');
  });

  it.each([
    ['disclosure_report', 'disclosure-report'],
    ['lobbyist_report', 'lobbyist-report'],
    ['entity_registration', 'entity-registration'],
    ['lobbyist_registration', 'lobbyist-registration'],
  ] as const)('produces identical output on repeated runs (%s)', (kind, fixture) => {
    const html = loadHtmlFixture(fixture);

    const first = serializeFiling(extractFiling({ kind, html })._unsafeUnwrap());
    const second = serializeFiling(extractFiling({ kind, html })._unsafeUnwrap());

    expect(second).toBe(first);
  });
});
