import { describe, expect, it } from 'vitest';

import {
  extractLobbyistReportInfo,
  extractReportInfo,
  organizationTypeFromLegend,
  parseReportTitle,
} from '@/modules/extraction/index.js';

import { makeDocument, page } from '../../fixtures/builders.js';
import { loadHtmlFixture } from '../../fixtures/html.js';

describe('parseReportTitle', () => {
  it('splits on the first separator and reads the organization type', () => {
    expect(parseReportTitle('Disclosures - 2024 Report For Political Action Committee')).toEqual({
      title: '2024 Report For Political Action Committee',
      organizationType: 'Political Action Committee',
    });
  });

  it('leaves the organization type empty without a "For" part', () => {
    expect(parseReportTitle('Disclosures - Year End - Amended')).toEqual({
      title: 'Year End - Amended',
      organizationType: '',
    });
  });

  it('fixes the organization type of lobbyist reports', () => {
    expect(parseReportTitle('Disclosures - Q1 Report For Someone', 'lobbyist')?.organizationType).toBe(
      'Lobbyist/Principal'
    );
  });

  it('returns null without a separator', () => {
    expect(parseReportTitle('Disclosures')).toBeNull();
  });
});

describe('organizationTypeFromLegend', () => {
  it('strips the Information suffix', () => {
    expect(organizationTypeFromLegend('Political Action Committee Information')).toBe(
      'Political Action Committee'
    );
    expect(organizationTypeFromLegend('Contributions')).toBeNull();
  });
});

describe('extractReportInfo', () => {
  it('merges title, legend, fieldset and grid fields', () => {
    const info = extractReportInfo(makeDocument(loadHtmlFixture('disclosure-report')));

    expect(info.title).toBe('2024 Year End Report For Political Action Committee');
    expect(info.organizationType).toBe('Political Action Committee');
    expect(info.organizationName).toBe('Friends of Test Valley');
    expect(info.reportType).toBe('Year End');
    expect(info.beginDate).toEqual({ raw: '1/1/2024', value: '2024-01-01' });
    expect(info.endDate).toEqual({ raw: '12/31/2024', value: '2024-12-31' });
    expect(info.dueDate).toEqual({ raw: '01/10/2025', value: '2025-01-10' });
    expect(info.submitDate).toEqual({ raw: '--', value: null });
    expect(info.fields).toEqual({
      Name: 'Friends of Test Valley',
      'Report Type': 'Year End',
      'Begin Date': '1/1/2024',
      'End Date': '12/31/2024',
      'Due Date': '01/10/2025',
      'Submit Date': '--',
    });
  });

  it('takes the organization type from the legend when the title has none', () => {
    const html = page(
      '<fieldset><legend>Corporation Information</legend>' +
        '<div class="dis-cell"><label>Name:</label> Sample Corp</div></fieldset>',
      'Disclosures'
    );

    const info = extractReportInfo(makeDocument(html));

    expect(info.title).toBe('');
    expect(info.organizationType).toBe('Corporation');
  });

  it('ignores grid values that look like labels', () => {
    const html = page(
      '<div class="row"><div class="col-md-6">Report Type:</div><div class="col-md-6">Begin Date:</div></div>'
    );

    expect(extractReportInfo(makeDocument(html)).fields).toEqual({});
  });
});

describe('extractLobbyistReportInfo', () => {
  it('prefixes principal fields and promotes the principal contact', () => {
    const info = extractLobbyistReportInfo(makeDocument(loadHtmlFixture('lobbyist-report')));

    expect(info.title).toBe('Q1 Expenditure Report');
    expect(info.organizationType).toBe('Lobbyist/Principal');
    expect(info.organizationName).toBe('Lee Placeholder');
    expect(info.reportType).toBe('Quarterly');
    expect(info.principal).toEqual({
      name: 'Test Industry Council',
      phone: '555-0100',
      streetAddress: '1 Capitol Way',
      city: 'Salt Lake City',
      state: 'UT',
      zip: '84101',
    });
    expect(info.fields['Principal Name']).toBe('Test Industry Council');
  });

  it('defaults the report type', () => {
    const info = extractLobbyistReportInfo(makeDocument(page('<p>empty</p>')));

    expect(info.reportType).toBe('Lobbyist Expenditure');
    expect(info.principal.name).toBe('');
  });
});
