import { describe, expect, it } from 'vitest';

import { balanceLineKey, extractBalanceSummary, promoteBalances } from '@/modules/extraction/index.js';

import { makeDocument, page } from '../../fixtures/builders.js';

const summaryAsNumbers = (html: string): Record<string, number> =>
  Object.fromEntries(
    [...extractBalanceSummary(makeDocument(html))].map(([label, amount]) => [label, amount.toNumber()])
  );

const balancePage = (rows: string): string =>
  page(`<h1>Balance Summary</h1><table>${rows}</table>`);

describe('balanceLineKey', () => {
  it('removes parenthetical notes and the trailing colon', () => {
    expect(balanceLineKey('Total Contributions Received (Schedule A):')).toBe(
      'Total Contributions Received'
    );
  });

  it('rejects bare line numbers', () => {
    expect(balanceLineKey('12')).toBe('');
  });
});

describe('extractBalanceSummary', () => {
  const twoCell = balancePage(
    '<tr><td>Balance at Beginning of Reporting Period:</td><td>$1,000.00</td></tr>' +
      '<tr><td>Total Contributions Received (Schedule A):</td><td>$250.50</td></tr>' +
      '<tr><td>Ending Balance:</td><td>--</td></tr>'
  );

  const fourCell = balancePage(
    '<tr><td>1</td><td>Balance at Beginning of Reporting Period:</td><td>$1,000.00</td><td></td></tr>' +
      '<tr><td>2</td><td>Total Contributions Received (Schedule A):</td><td>$250.50</td><td>note</td></tr>' +
      '<tr><td>3</td><td>Ending Balance:</td><td>--</td><td></td></tr>'
  );

  it('reads label and amount from two-cell rows', () => {
    expect(summaryAsNumbers(twoCell)).toEqual({
      'Balance at Beginning of Reporting Period': 1000,
      'Total Contributions Received': 250.5,
      'Ending Balance': 0,
    });
  });

  it('gives the same map for line-numbered rows', () => {
    expect(summaryAsNumbers(fourCell)).toEqual(summaryAsNumbers(twoCell));
  });

  it('skips numeric labels and single-cell rows', () => {
    const html = balancePage(
      '<tr><td>Header only</td></tr>' +
        '<tr><td>4</td><td>5</td><td>$9.00</td></tr>' +
        '<tr><td>Ending Balance</td><td>$3.00</td></tr>'
    );

    expect(summaryAsNumbers(html)).toEqual({ 'Ending Balance': 3 });
  });

  it('keeps the first of duplicated lines', () => {
    const html = balancePage(
      '<tr><td>Ending Balance</td><td>$3.00</td></tr><tr><td>Ending Balance</td><td>$4.00</td></tr>'
    );

    expect(summaryAsNumbers(html)).toEqual({ 'Ending Balance': 3 });
  });

  it('is empty without the heading', () => {
    const html = page('<table><tr><td>Ending Balance</td><td>$3.00</td></tr></table>');

    expect(extractBalanceSummary(makeDocument(html)).size).toBe(0);
  });

  it('promotes the named balance lines', () => {
    const balances = promoteBalances(extractBalanceSummary(makeDocument(twoCell)));

    expect(balances.beginning?.toNumber()).toBe(1000);
    expect(balances.totalContributions?.toNumber()).toBe(250.5);
    expect(balances.totalExpenditures).toBeNull();
    expect(balances.ending?.toNumber()).toBe(0);
  });
});
