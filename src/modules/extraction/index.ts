// Use case
export {
  extractFiling,
  extractFromDocument,
  extractDisclosureReport,
  extractLobbyistReport,
  type ExtractFilingInput,
} from './core/usecases/extract-filing.js';

// Components
export { FieldMap } from './core/field-map.js';
export {
  contains,
  exact,
  forAttr,
  matchesLabel,
  promoteFields,
  type FieldRule,
  type LabelMatcher,
  type LabeledValue,
  type PromotedFields,
} from './core/field-rules.js';
export { extractLabelValues, collectLabelFields, type LabelValues } from './core/label-values.js';
export { parseAddress, formatCityState, extractStateCode, EMPTY_ADDRESS } from './core/address.js';
export { parseCurrency, sumAmounts } from './core/currency.js';
export { parseFilingDate, parseIsoDate, isUnparsedDate, EMPTY_DATE } from './core/dates.js';
export {
  extractBalanceSummary,
  promoteBalances,
  balanceLine,
  balanceLineKey,
  BALANCE_LINES,
} from './core/balance-summary.js';
export {
  extractContributions,
  extractExpenditures,
  extractLobbyistExpenditures,
  detectAmountColumn,
  readFlags,
  isAmountText,
  isFlagSet,
  CONTRIBUTION_LAYOUT,
  EXPENDITURE_LAYOUT,
  LOBBYIST_EXPENDITURE_LAYOUT,
  DEFAULT_FLAG_MARKER,
  type TableLayout,
  type FlagColumn,
  type FlagName,
  type TransactionFlags,
  type TransactionTableOptions,
} from './core/transactions.js';
export {
  extractReportInfo,
  extractLobbyistReportInfo,
  parseReportTitle,
  organizationTypeFromLegend,
  LOBBYIST_ORGANIZATION_TYPE,
  type ReportVariant,
} from './core/report-info.js';
export {
  extractEntityRegistration,
  extractLobbyistRegistration,
  ENTITY_RULES,
  LOBBYIST_RULES,
} from './core/registration.js';
export {
  extractOfficers,
  extractPrincipals,
  assembleName,
  OFFICER_SEGMENTS,
  PRINCIPAL_SEGMENTS,
} from './core/blocks.js';
export { totalsOf, countRecords, unparsedDates } from './core/summary.js';
export { extractIdFromUrl } from './core/source-id.js';

// Types
export type {
  Address,
  BalanceSummary,
  Contribution,
  DisclosureReport,
  EntityRegistration,
  Expenditure,
  Filing,
  FilingDate,
  FilingKind,
  FilingMeta,
  LobbyistExpenditure,
  LobbyistRegistration,
  LobbyistReport,
  LobbyistReportInfo,
  Officer,
  Principal,
  PrincipalContact,
  RegistrationAddress,
  ReportBalances,
  ReportInfo,
  TransactionRecord,
  TransactionTotals,
} from './core/types.js';
export { FILING_KINDS } from './core/types.js';

// Shell
export { toFilingJson, serializeFiling, type JsonObject, type JsonValue } from './shell/json/filing-json.js';
