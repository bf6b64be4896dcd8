/**
 * Extraction module types.
 *
 * Structured records produced from one filing page. Missing text fields are
 * '' and missing amounts are null; nothing here is mutated after extraction.
 */

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Values
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A date as printed on the filing and its parsed ISO `YYYY-MM-DD` form.
 */
export interface FilingDate {
  readonly raw: string;
  /** null when the text is blank or not a recognised date */
  readonly value: string | null;
}

/**
 * US postal address. `state` is two capital letters and `zip` five digits
 * (optionally +4) whenever they are set.
 */
export interface Address {
  readonly street: string;
  readonly city: string;
  readonly state: string;
  readonly zip: string;
}

export interface RegistrationAddress extends Address {
  readonly suitePoBox: string;
}

/**
 * Balance line label (parenthetical notes removed) → amount, in table order.
 */
export type BalanceSummary = ReadonlyMap<string, Decimal>;

// ─────────────────────────────────────────────────────────────────────────────
// Transactions
// ─────────────────────────────────────────────────────────────────────────────

interface TransactionBase {
  readonly date: FilingDate;
  /** Contributor or recipient name */
  readonly counterparty: string;
  readonly amendment: boolean;
  readonly amount: Decimal;
}

export interface Contribution extends TransactionBase {
  readonly kind: 'contribution';
  readonly address: string;
  readonly inKind: boolean;
  readonly loan: boolean;
}

export interface Expenditure extends TransactionBase {
  readonly kind: 'expenditure';
  readonly purpose: string;
  readonly inKind: boolean;
  readonly loan: boolean;
}

export interface LobbyistExpenditure extends TransactionBase {
  readonly kind: 'lobbyist_expenditure';
  readonly location: string;
  readonly purpose: string;
}

export type TransactionRecord = Contribution | Expenditure | LobbyistExpenditure;

export interface TransactionTotals {
  readonly count: number;
  readonly amount: Decimal;
}

// ─────────────────────────────────────────────────────────────────────────────
// Reports
// ─────────────────────────────────────────────────────────────────────────────

export interface ReportInfo {
  readonly title: string;
  readonly organizationType: string;
  readonly organizationName: string;
  readonly reportType: string;
  readonly beginDate: FilingDate;
  readonly endDate: FilingDate;
  readonly dueDate: FilingDate;
  readonly submitDate: FilingDate;
  /** Every field read from the page, first occurrence kept */
  readonly fields: Readonly<Record<string, string>>;
}

export interface PrincipalContact {
  readonly name: string;
  readonly phone: string;
  readonly streetAddress: string;
  readonly city: string;
  readonly state: string;
  readonly zip: string;
}

export interface LobbyistReportInfo extends ReportInfo {
  readonly principal: PrincipalContact;
}

export interface ReportBalances {
  readonly beginning: Decimal | null;
  readonly totalContributions: Decimal | null;
  readonly totalExpenditures: Decimal | null;
  readonly ending: Decimal | null;
}

export interface DisclosureReport {
  readonly kind: 'disclosure_report';
  readonly reportId: string | null;
  readonly sourceUrl: string | null;
  readonly reportInfo: ReportInfo;
  readonly balanceSummary: BalanceSummary;
  readonly balances: ReportBalances;
  readonly contributions: readonly Contribution[];
  readonly expenditures: readonly Expenditure[];
  readonly summary: {
    readonly contributions: TransactionTotals;
    readonly expenditures: TransactionTotals;
  };
}

export interface LobbyistReport {
  readonly kind: 'lobbyist_report';
  readonly reportId: string | null;
  readonly sourceUrl: string | null;
  readonly reportInfo: LobbyistReportInfo;
  readonly balanceSummary: BalanceSummary;
  readonly totalExpenditures: Decimal | null;
  readonly expenditures: readonly LobbyistExpenditure[];
  readonly summary: {
    readonly expenditures: TransactionTotals;
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Registrations
// ─────────────────────────────────────────────────────────────────────────────

export interface Officer {
  /** Discovery position of the block's marker, 0-based */
  readonly order: number;
  readonly isTreasurer: boolean;
  readonly name: string;
  readonly firstName: string;
  readonly middleName: string;
  readonly lastName: string;
  readonly title: string;
  readonly occupation: string;
  readonly phone: string;
  readonly email: string;
  readonly address: RegistrationAddress;
}

export interface Principal {
  readonly order: number;
  readonly name: string;
  readonly contact: string;
  readonly phone: string;
  readonly address: string;
}

export interface EntityRegistration {
  readonly kind: 'entity_registration';
  readonly entityId: string | null;
  readonly sourceUrl: string | null;
  readonly name: string;
  readonly alsoKnownAs: string;
  readonly entityType: string;
  readonly status: string;
  readonly dateCreated: FilingDate;
  readonly address: RegistrationAddress;
  readonly officers: readonly Officer[];
  readonly fields: Readonly<Record<string, string>>;
}

export interface LobbyistRegistration {
  readonly kind: 'lobbyist_registration';
  readonly entityId: string | null;
  readonly sourceUrl: string | null;
  readonly entityType: 'Lobbyist';
  readonly name: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phone: string;
  readonly organizationName: string;
  readonly registrationDate: FilingDate;
  readonly address: Address;
  readonly principalName: string;
  readonly lobbyingPurposes: string;
  readonly principals: readonly Principal[];
  readonly fields: Readonly<Record<string, string>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Filing
// ─────────────────────────────────────────────────────────────────────────────

export type Filing = DisclosureReport | LobbyistReport | EntityRegistration | LobbyistRegistration;

export type FilingKind = Filing['kind'];

export const FILING_KINDS: readonly FilingKind[] = [
  'disclosure_report',
  'lobbyist_report',
  'entity_registration',
  'lobbyist_registration',
];

/**
 * Where a filing came from. Both parts are optional.
 */
export interface FilingMeta {
  readonly id: string | null;
  readonly sourceUrl: string | null;
}
