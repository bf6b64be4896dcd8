import { sumAmounts } from './currency.js';
import { isUnparsedDate } from './dates.js';

import type { Filing, FilingDate, TransactionRecord, TransactionTotals } from './types.js';

export const totalsOf = (transactions: readonly TransactionRecord[]): TransactionTotals => ({
  count: transactions.length,
  amount: sumAmounts(transactions.map((transaction) => transaction.amount)),
});

/**
 * Number of child records (transactions, officers or principals).
 */
export const countRecords = (filing: Filing): number => {
  switch (filing.kind) {
    case 'disclosure_report':
      return filing.contributions.length + filing.expenditures.length;
    case 'lobbyist_report':
      return filing.expenditures.length;
    case 'entity_registration':
      return filing.officers.length;
    case 'lobbyist_registration':
      return filing.principals.length;
  }
};

const filingDates = (filing: Filing): FilingDate[] => {
  switch (filing.kind) {
    case 'disclosure_report': {
      const { beginDate, endDate, dueDate, submitDate } = filing.reportInfo;
      return [
        beginDate,
        endDate,
        dueDate,
        submitDate,
        ...filing.contributions.map((c) => c.date),
        ...filing.expenditures.map((e) => e.date),
      ];
    }
    case 'lobbyist_report': {
      const { beginDate, endDate, dueDate, submitDate } = filing.reportInfo;
      return [beginDate, endDate, dueDate, submitDate, ...filing.expenditures.map((e) => e.date)];
    }
    case 'entity_registration':
      return [filing.dateCreated];
    case 'lobbyist_registration':
      return [filing.registrationDate];
  }
};

/**
 * Raw text of every date in the filing that did not parse.
 */
export const unparsedDates = (filing: Filing): string[] =>
  filingDates(filing)
    .filter(isUnparsedDate)
    .map((date) => date.raw);
