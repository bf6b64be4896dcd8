/**
 * Balance Summary Extractor
 *
 * Reads the table after the "Balance Summary" heading. Rows come in two
 * layouts: `label | amount`, or `line no. | label | amount | …`.
 */

import { labelKey, type FilingDocument, type TableRow } from '@/modules/document/index.js';

import { parseCurrency } from './currency.js';

import type { BalanceSummary, ReportBalances } from './types.js';
import type { Decimal } from 'decimal.js';

const BALANCE_HEADING_RE = /Balance Summary/i;
const LINE_NUMBER_RE = /^\d+$/;
const PARENTHETICAL_RE = /\([^)]*\)/g;

/**
 * Line labels promoted into named report fields.
 */
export const BALANCE_LINES = {
  beginning: 'Balance at Beginning of Reporting Period',
  totalContributions: 'Total Contributions Received',
  totalExpenditures: 'Total Expenditures Made',
  ending: 'Ending Balance',
} as const;

/**
 * Map key for a balance line label: no trailing colon, no parenthetical
 * notes. '' when the label is a bare line number.
 */
export const balanceLineKey = (text: string): string => {
  const label = labelKey(text);
  if (LINE_NUMBER_RE.test(label)) return '';
  return labelKey(label.replace(PARENTHETICAL_RE, ' '));
};

const rowCells = (row: TableRow): { label: string; amount: string } | null => {
  if (row.length === 2) {
    return { label: row[0]?.text ?? '', amount: row[1]?.text ?? '' };
  }
  if (row.length >= 3) {
    return { label: row[1]?.text ?? '', amount: row[2]?.text ?? '' };
  }
  return null;
};

/**
 * Empty when the page has no balance heading or no table after it.
 */
export const extractBalanceSummary = (doc: FilingDocument): BalanceSummary => {
  const summary = new Map<string, Decimal>();
  const rows = doc.tableAfterHeading(BALANCE_HEADING_RE);
  if (rows === null) return summary;

  for (const row of rows) {
    const cells = rowCells(row);
    if (cells === null) continue;

    const key = balanceLineKey(cells.label);
    if (key === '' || summary.has(key)) continue;

    summary.set(key, parseCurrency(cells.amount));
  }

  return summary;
};

export const balanceLine = (summary: BalanceSummary, label: string): Decimal | null =>
  summary.get(label) ?? null;

export const promoteBalances = (summary: BalanceSummary): ReportBalances => ({
  beginning: balanceLine(summary, BALANCE_LINES.beginning),
  totalContributions: balanceLine(summary, BALANCE_LINES.totalContributions),
  totalExpenditures: balanceLine(summary, BALANCE_LINES.totalExpenditures),
  ending: balanceLine(summary, BALANCE_LINES.ending),
});
