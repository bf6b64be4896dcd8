/**
 * JSON rendering of extracted filings.
 *
 * snake_case field groups, amounts as numbers, dates as ISO strings (null
 * when unparsed) next to their raw text. Key order is fixed, so the same
 * filing always serializes to the same bytes.
 */

import type {
  Address,
  BalanceSummary,
  Contribution,
  Expenditure,
  Filing,
  FilingDate,
  LobbyistExpenditure,
  Officer,
  Principal,
  RegistrationAddress,
  ReportInfo,
  TransactionTotals,
} from '../../core/types.js';
import type { Decimal } from 'decimal.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

const amount = (value: Decimal): number => value.toNumber();
const optionalAmount = (value: Decimal | null): number | null =>
  value === null ? null : value.toNumber();

const dateFields = (name: string, date: FilingDate): JsonObject => ({
  [name]: date.value,
  [`${name}_raw`]: date.raw,
});

const balanceSummaryJson = (summary: BalanceSummary): JsonObject => {
  const json: JsonObject = {};
  for (const [label, value] of summary) {
    json[label] = amount(value);
  }
  return json;
};

const totalsJson = (name: string, totals: TransactionTotals): JsonObject => ({
  [`total_${name}s`]: totals.count,
  [`total_${name}_amount`]: amount(totals.amount),
});

const addressJson = (address: Address): JsonObject => ({
  street_address: address.street,
  city: address.city,
  state: address.state,
  zip_code: address.zip,
});

const registrationAddressJson = (address: RegistrationAddress): JsonObject => ({
  street_address: address.street,
  suite_po_box: address.suitePoBox,
  city: address.city,
  state: address.state,
  zip_code: address.zip,
});

const reportInfoJson = (info: ReportInfo): JsonObject => ({
  title: info.title,
  organization_type: info.organizationType,
  organization_name: info.organizationName,
  report_type: info.reportType,
  ...dateFields('begin_date', info.beginDate),
  ...dateFields('end_date', info.endDate),
  ...dateFields('due_date', info.dueDate),
  ...dateFields('submit_date', info.submitDate),
  raw_fields: { ...info.fields },
});

const contributionJson = (c: Contribution): JsonObject => ({
  ...dateFields('date_received', c.date),
  contributor_name: c.counterparty,
  address: c.address,
  is_in_kind: c.inKind,
  is_loan: c.loan,
  is_amendment: c.amendment,
  amount: amount(c.amount),
});

const expenditureJson = (e: Expenditure): JsonObject => ({
  ...dateFields('date', e.date),
  recipient_name: e.counterparty,
  purpose: e.purpose,
  is_in_kind: e.inKind,
  is_loan: e.loan,
  is_amendment: e.amendment,
  amount: amount(e.amount),
});

const lobbyistExpenditureJson = (e: LobbyistExpenditure): JsonObject => ({
  ...dateFields('date', e.date),
  recipient_name: e.counterparty,
  location: e.location,
  purpose: e.purpose,
  is_amendment: e.amendment,
  amount: amount(e.amount),
});

const officerJson = (o: Officer): JsonObject => ({
  order: o.order,
  is_treasurer: o.isTreasurer,
  name: o.name,
  first_name: o.firstName,
  middle_name: o.middleName,
  last_name: o.lastName,
  title: o.title,
  occupation: o.occupation,
  phone: o.phone,
  email: o.email,
  ...registrationAddressJson(o.address),
});

const principalJson = (p: Principal): JsonObject => ({
  order: p.order,
  name: p.name,
  contact: p.contact,
  phone: p.phone,
  address: p.address,
});

export const toFilingJson = (filing: Filing): JsonObject => {
  switch (filing.kind) {
    case 'disclosure_report':
      return {
        kind: filing.kind,
        report_id: filing.reportId,
        source_url: filing.sourceUrl,
        report_info: reportInfoJson(filing.reportInfo),
        balance_summary: balanceSummaryJson(filing.balanceSummary),
        balance_beginning: optionalAmount(filing.balances.beginning),
        total_contributions: optionalAmount(filing.balances.totalContributions),
        total_expenditures: optionalAmount(filing.balances.totalExpenditures),
        ending_balance: optionalAmount(filing.balances.ending),
        contributions: filing.contributions.map(contributionJson),
        expenditures: filing.expenditures.map(expenditureJson),
        summary: {
          ...totalsJson('contribution', filing.summary.contributions),
          ...totalsJson('expenditure', filing.summary.expenditures),
        },
      };
    case 'lobbyist_report': {
      const { principal } = filing.reportInfo;
      return {
        kind: filing.kind,
        report_id: filing.reportId,
        source_url: filing.sourceUrl,
        report_info: {
          ...reportInfoJson(filing.reportInfo),
          principal: {
            name: principal.name,
            phone: principal.phone,
            street_address: principal.streetAddress,
            city: principal.city,
            state: principal.state,
            zip_code: principal.zip,
          },
        },
        balance_summary: balanceSummaryJson(filing.balanceSummary),
        total_expenditures: optionalAmount(filing.totalExpenditures),
        lobbyist_expenditures: filing.expenditures.map(lobbyistExpenditureJson),
        summary: totalsJson('expenditure', filing.summary.expenditures),
      };
    }
    case 'entity_registration':
      return {
        kind: filing.kind,
        entity_id: filing.entityId,
        source_url: filing.sourceUrl,
        name: filing.name,
        also_known_as: filing.alsoKnownAs,
        entity_type: filing.entityType,
        status: filing.status,
        ...dateFields('date_created', filing.dateCreated),
        ...registrationAddressJson(filing.address),
        officers: filing.officers.map(officerJson),
        raw_fields: { ...filing.fields },
      };
    case 'lobbyist_registration':
      return {
        kind: filing.kind,
        entity_id: filing.entityId,
        source_url: filing.sourceUrl,
        entity_type: filing.entityType,
        name: filing.name,
        first_name: filing.firstName,
        last_name: filing.lastName,
        phone: filing.phone,
        organization_name: filing.organizationName,
        ...dateFields('registration_date', filing.registrationDate),
        ...addressJson(filing.address),
        principal_name: filing.principalName,
        lobbying_purposes: filing.lobbyingPurposes,
        principals: filing.principals.map(principalJson),
        raw_fields: { ...filing.fields },
      };
  }
};

/**
 * Pretty-printed JSON text of a filing.
 */
export const serializeFiling = (filing: Filing): string =>
  `${JSON.stringify(toFilingJson(filing), null, 2)}\n`;
