/**
 * Extract Filing Use Case
 *
 * Single entry point of the extraction core: parses one page and assembles
 * the structured record for its filing kind. Pure and synchronous; the only
 * failure is a page that cannot be parsed at all.
 */

import { FilingDocument, type DocumentParseError } from '@/modules/document/index.js';

import { extractBalanceSummary, promoteBalances, balanceLine, BALANCE_LINES } from '../balance-summary.js';
import { extractLobbyistRegistration, extractEntityRegistration } from '../registration.js';
import { extractLobbyistReportInfo, extractReportInfo } from '../report-info.js';
import { extractIdFromUrl } from '../source-id.js';
import { totalsOf } from '../summary.js';
import {
  extractContributions,
  extractExpenditures,
  extractLobbyistExpenditures,
  type TransactionTableOptions,
} from '../transactions.js';

import type {
  DisclosureReport,
  Filing,
  FilingKind,
  FilingMeta,
  LobbyistReport,
} from '../types.js';
import type { Result } from 'neverthrow';

export interface ExtractFilingInput {
  kind: FilingKind;
  html: string;
  sourceUrl?: string;
  /** Report or entity id. Read from the end of `sourceUrl` when omitted. */
  id?: string;
  tables?: TransactionTableOptions;
}

export const extractDisclosureReport = (
  doc: FilingDocument,
  meta: FilingMeta,
  tables: TransactionTableOptions = {}
): DisclosureReport => {
  const balanceSummary = extractBalanceSummary(doc);
  const contributions = extractContributions(doc, tables);
  const expenditures = extractExpenditures(doc, tables);

  return {
    kind: 'disclosure_report',
    reportId: meta.id,
    sourceUrl: meta.sourceUrl,
    reportInfo: extractReportInfo(doc),
    balanceSummary,
    balances: promoteBalances(balanceSummary),
    contributions,
    expenditures,
    summary: {
      contributions: totalsOf(contributions),
      expenditures: totalsOf(expenditures),
    },
  };
};

export const extractLobbyistReport = (
  doc: FilingDocument,
  meta: FilingMeta,
  tables: TransactionTableOptions = {}
): LobbyistReport => {
  const balanceSummary = extractBalanceSummary(doc);
  const expenditures = extractLobbyistExpenditures(doc, tables);

  return {
    kind: 'lobbyist_report',
    reportId: meta.id,
    sourceUrl: meta.sourceUrl,
    reportInfo: extractLobbyistReportInfo(doc),
    balanceSummary,
    totalExpenditures: balanceLine(balanceSummary, BALANCE_LINES.totalExpenditures),
    expenditures,
    summary: { expenditures: totalsOf(expenditures) },
  };
};

export const extractFromDocument = (
  doc: FilingDocument,
  kind: FilingKind,
  meta: FilingMeta,
  tables: TransactionTableOptions = {}
): Filing => {
  switch (kind) {
    case 'disclosure_report':
      return extractDisclosureReport(doc, meta, tables);
    case 'lobbyist_report':
      return extractLobbyistReport(doc, meta, tables);
    case 'entity_registration':
      return extractEntityRegistration(doc, meta);
    case 'lobbyist_registration':
      return extractLobbyistRegistration(doc, meta);
  }
};

/**
 * Parses the page and extracts the filing.
 */
export const extractFiling = (input: ExtractFilingInput): Result<Filing, DocumentParseError> => {
  const sourceUrl = input.sourceUrl ?? null;
  const meta: FilingMeta = {
    id: input.id ?? (sourceUrl !== null ? extractIdFromUrl(sourceUrl) : null),
    sourceUrl,
  };

  return FilingDocument.parse(input.html).map((doc) =>
    extractFromDocument(doc, input.kind, meta, input.tables ?? {})
  );
};
