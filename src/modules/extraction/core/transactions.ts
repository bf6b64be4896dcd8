/**
 * Transaction Table Extractor
 *
 * Contribution and expenditure tables changed column counts across filing
 * layouts (6, 7 or 8 cells). Only the leading columns keep a fixed position;
 * the amount column is found by scanning from the right, and the flag
 * columns sit at fixed offsets to its left.
 */

import { parseCurrency } from './currency.js';
import { parseFilingDate } from './dates.js';

import type {
  Contribution,
  Expenditure,
  FilingDate,
  LobbyistExpenditure,
} from './types.js';
import type { FilingDocument, TableCell, TableRow } from '@/modules/document/index.js';
import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Layouts
// ─────────────────────────────────────────────────────────────────────────────

export type FlagName = 'amendment' | 'loan' | 'inKind';

export type TransactionFlags = Record<FlagName, boolean>;

export interface FlagColumn {
  readonly name: FlagName;
  /** Distance to the left of the amount column */
  readonly offset: number;
}

/**
 * Where a transaction table is and how its rows are laid out.
 */
export interface TableLayout {
  /** Header text that identifies the table */
  readonly keyword: string;
  /** Header text that rules a table out */
  readonly exclude?: string;
  /** Rows with fewer cells are skipped */
  readonly minCells: number;
  /** Leading positional columns; a flag offset landing on one is not read */
  readonly fixedColumns: number;
  readonly flags: readonly FlagColumn[];
}

const REPORT_FLAGS: readonly FlagColumn[] = [
  { name: 'amendment', offset: 1 },
  { name: 'loan', offset: 2 },
  { name: 'inKind', offset: 3 },
];

export const CONTRIBUTION_LAYOUT: TableLayout = {
  keyword: 'Contribution',
  exclude: 'Expenditure',
  minCells: 7,
  fixedColumns: 3,
  flags: REPORT_FLAGS,
};

export const EXPENDITURE_LAYOUT: TableLayout = {
  keyword: 'Expenditure',
  minCells: 7,
  fixedColumns: 3,
  flags: REPORT_FLAGS,
};

export const LOBBYIST_EXPENDITURE_LAYOUT: TableLayout = {
  keyword: 'Expenditure',
  minCells: 6,
  fixedColumns: 4,
  flags: [{ name: 'amendment', offset: 1 }],
};

export interface TransactionTableOptions {
  /** CSS selector of candidate tables. Defaults to `table.dis-table`. */
  tableSelector?: string;
  /** Element that marks a set flag inside a flag cell. */
  flagMarker?: string;
}

export const DEFAULT_FLAG_MARKER = 'a.anchorLink';

// ─────────────────────────────────────────────────────────────────────────────
// Columns
// ─────────────────────────────────────────────────────────────────────────────

const PLAIN_NUMBER_RE = /^\d+$/;
const NUMBER_PUNCTUATION_RE = /[,.]/g;

export const isAmountText = (text: string): boolean =>
  text.includes('$') || PLAIN_NUMBER_RE.test(text.replace(NUMBER_PUNCTUATION_RE, ''));

/**
 * Index of the rightmost cell holding a `$` or a plain number, else the
 * last cell.
 */
export const detectAmountColumn = (cells: readonly Pick<TableCell, 'text'>[]): number => {
  for (let index = cells.length - 1; index >= 0; index -= 1) {
    const cell = cells[index];
    if (cell !== undefined && isAmountText(cell.text)) {
      return index;
    }
  }
  return cells.length - 1;
};

/**
 * A flag is set only when its cell has both text and the marker element.
 */
export const isFlagSet = (cell: TableCell | undefined, marker: string): boolean =>
  cell !== undefined && cell.text !== '' && cell.contains(marker);

export const readFlags = (
  cells: TableRow,
  amountIndex: number,
  layout: TableLayout,
  marker: string = DEFAULT_FLAG_MARKER
): TransactionFlags => {
  const flags: TransactionFlags = { amendment: false, loan: false, inKind: false };

  for (const { name, offset } of layout.flags) {
    const index = amountIndex - offset;
    if (index < layout.fixedColumns) continue;
    flags[name] = isFlagSet(cells[index], marker);
  }

  return flags;
};

// ─────────────────────────────────────────────────────────────────────────────
// Rows
// ─────────────────────────────────────────────────────────────────────────────

interface ParsedRow {
  /** Cell text by position, '' past the end of the row */
  text(index: number): string;
  readonly date: FilingDate;
  readonly amount: Decimal;
  readonly flags: TransactionFlags;
}

const parseRows = (
  doc: FilingDocument,
  layout: TableLayout,
  options: TransactionTableOptions
): ParsedRow[] => {
  const table = doc.tableByHeaderKeyword(layout.keyword, {
    ...(options.tableSelector !== undefined && { selector: options.tableSelector }),
    ...(layout.exclude !== undefined && { exclude: layout.exclude }),
  });
  if (table === null) return [];

  const marker = options.flagMarker ?? DEFAULT_FLAG_MARKER;

  return table.rows
    .filter((cells) => cells.length >= layout.minCells)
    .map((cells) => {
      const text = (index: number): string => cells[index]?.text ?? '';
      const amountIndex = detectAmountColumn(cells);
      return {
        text,
        date: parseFilingDate(text(0)),
        amount: parseCurrency(text(amountIndex)),
        flags: readFlags(cells, amountIndex, layout, marker),
      };
    });
};

/**
 * Rows of the first table whose header mentions contributions but not
 * expenditures.
 */
export const extractContributions = (
  doc: FilingDocument,
  options: TransactionTableOptions = {}
): Contribution[] =>
  parseRows(doc, CONTRIBUTION_LAYOUT, options).map((row) => ({
    kind: 'contribution',
    date: row.date,
    counterparty: row.text(1),
    address: row.text(2),
    inKind: row.flags.inKind,
    loan: row.flags.loan,
    amendment: row.flags.amendment,
    amount: row.amount,
  }));

export const extractExpenditures = (
  doc: FilingDocument,
  options: TransactionTableOptions = {}
): Expenditure[] =>
  parseRows(doc, EXPENDITURE_LAYOUT, options).map((row) => ({
    kind: 'expenditure',
    date: row.date,
    counterparty: row.text(1),
    purpose: row.text(2),
    inKind: row.flags.inKind,
    loan: row.flags.loan,
    amendment: row.flags.amendment,
    amount: row.amount,
  }));

/**
 * Lobbyist rows: date, recipient, location, purpose, amendment, amount.
 */
export const extractLobbyistExpenditures = (
  doc: FilingDocument,
  options: TransactionTableOptions = {}
): LobbyistExpenditure[] =>
  parseRows(doc, LOBBYIST_EXPENDITURE_LAYOUT, options).map((row) => ({
    kind: 'lobbyist_expenditure',
    date: row.date,
    counterparty: row.text(1),
    location: row.text(2),
    purpose: row.text(3),
    amendment: row.flags.amendment,
    amount: row.amount,
  }));
