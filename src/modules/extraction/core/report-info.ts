/**
 * Report Field Mapper
 *
 * Report metadata is spread over the page title, fieldset legends, labeled
 * fieldset cells and loose grid rows. The sources are read in that order and
 * each only fills what the earlier ones left empty.
 */

import { FieldMap } from './field-map.js';
import { parseFilingDate } from './dates.js';

import type { LobbyistReportInfo, PrincipalContact, ReportInfo } from './types.js';
import type { FilingDocument } from '@/modules/document/index.js';

export type ReportVariant = 'disclosure' | 'lobbyist';

const TITLE_SEPARATOR = ' - ';
const ORGANIZATION_TYPE_MARKER = 'For ';
const INFORMATION_LEGEND_RE = /\s*Information\b/;
const LABEL_LIKE_VALUE_RE = /:$/;

export const LOBBYIST_ORGANIZATION_TYPE = 'Lobbyist/Principal';
export const DEFAULT_LOBBYIST_REPORT_TYPE = 'Lobbyist Expenditure';

interface VariantRules {
  /** Organization type used whenever the title has a separator */
  readonly fixedOrganizationType?: string;
  /** Whether "<type> Information" legends name the organization type */
  readonly legendOrganizationType: boolean;
  /** Fieldsets whose legend mentions this text get their keys prefixed with it */
  readonly legendKeyPrefix?: string;
  readonly defaultReportType: string;
}

const VARIANTS: Record<ReportVariant, VariantRules> = {
  disclosure: {
    legendOrganizationType: true,
    defaultReportType: '',
  },
  lobbyist: {
    fixedOrganizationType: LOBBYIST_ORGANIZATION_TYPE,
    legendOrganizationType: false,
    legendKeyPrefix: 'Principal',
    defaultReportType: DEFAULT_LOBBYIST_REPORT_TYPE,
  },
};

/**
 * Keys of the merged field map, in priority order, for each report field.
 */
const REPORT_KEYS = {
  organizationName: ['Name'],
  reportType: ['Report Type'],
  beginDate: ['Begin Date'],
  endDate: ['End Date'],
  dueDate: ['Due Date'],
  submitDate: ['Submit Date'],
} as const;

const PRINCIPAL_KEYS: Record<keyof PrincipalContact, readonly string[]> = {
  name: ['Principal Name', 'Name'],
  phone: ['Principal Phone', 'Phone'],
  streetAddress: ['Principal Street Address'],
  city: ['Principal City'],
  state: ['Principal State'],
  zip: ['Principal Zip'],
};

// ─────────────────────────────────────────────────────────────────────────────
// Sources
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Splits a page title such as `Disclosures - 2024 Year End Report For
 * Political Action Committee` into the report title and organization type.
 *
 * @returns null when the title has no separator
 */
export const parseReportTitle = (
  pageTitle: string,
  variant: ReportVariant = 'disclosure'
): { title: string; organizationType: string } | null => {
  const separator = pageTitle.indexOf(TITLE_SEPARATOR);
  if (separator === -1) return null;

  const title = pageTitle.slice(separator + TITLE_SEPARATOR.length).trim();
  const fixed = VARIANTS[variant].fixedOrganizationType;
  if (fixed !== undefined) {
    return { title, organizationType: fixed };
  }

  const marker = title.lastIndexOf(ORGANIZATION_TYPE_MARKER);
  const organizationType =
    marker === -1 ? '' : title.slice(marker + ORGANIZATION_TYPE_MARKER.length).trim();
  return { title, organizationType };
};

/**
 * `Political Action Committee Information` → `Political Action Committee`.
 */
export const organizationTypeFromLegend = (legend: string): string | null => {
  if (!INFORMATION_LEGEND_RE.test(legend)) return null;
  return legend.replace(INFORMATION_LEGEND_RE, '').trim();
};

interface ReportFields {
  title: string;
  organizationType: string;
  fields: FieldMap;
}

/**
 * Merges every metadata source of a report page.
 */
export const collectReportFields = (doc: FilingDocument, variant: ReportVariant): ReportFields => {
  const rules = VARIANTS[variant];
  const meta = new FieldMap();
  const fields = new FieldMap();

  const parsedTitle = parseReportTitle(doc.title(), variant);
  if (parsedTitle !== null) {
    meta.setIfAbsent('title', parsedTitle.title);
    meta.setIfAbsent('organizationType', parsedTitle.organizationType);
  }

  if (rules.legendOrganizationType) {
    for (const legend of doc.legends()) {
      const organizationType = organizationTypeFromLegend(legend);
      if (organizationType !== null) {
        meta.setIfAbsent('organizationType', organizationType);
      }
    }
  }

  const prefix = rules.legendKeyPrefix;
  for (const cell of doc.fieldsetCells()) {
    const key =
      prefix !== undefined && cell.legend.includes(prefix) ? `${prefix} ${cell.label}` : cell.label;
    fields.setIfAbsent(key, cell.value);
  }

  for (const pair of doc.columnPairs()) {
    if (LABEL_LIKE_VALUE_RE.test(pair.value)) continue;
    fields.setIfAbsent(pair.label, pair.value);
  }

  return {
    title: meta.get('title') ?? '',
    organizationType: meta.get('organizationType') ?? '',
    fields,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Report info
// ─────────────────────────────────────────────────────────────────────────────

const buildReportInfo = (collected: ReportFields, defaultReportType: string): ReportInfo => {
  const { fields } = collected;
  const date = (keys: readonly string[]) => parseFilingDate(fields.first(keys) ?? '');

  return {
    title: collected.title,
    organizationType: collected.organizationType,
    organizationName: fields.first(REPORT_KEYS.organizationName) ?? '',
    reportType: fields.first(REPORT_KEYS.reportType) ?? defaultReportType,
    beginDate: date(REPORT_KEYS.beginDate),
    endDate: date(REPORT_KEYS.endDate),
    dueDate: date(REPORT_KEYS.dueDate),
    submitDate: date(REPORT_KEYS.submitDate),
    fields: fields.toRecord(),
  };
};

export const extractReportInfo = (doc: FilingDocument): ReportInfo =>
  buildReportInfo(collectReportFields(doc, 'disclosure'), VARIANTS.disclosure.defaultReportType);

/**
 * Report info of a lobbyist expenditure report, with the principal's
 * contact details.
 */
export const extractLobbyistReportInfo = (doc: FilingDocument): LobbyistReportInfo => {
  const collected = collectReportFields(doc, 'lobbyist');
  const { fields } = collected;
  const principalField = (field: keyof PrincipalContact): string =>
    fields.first(PRINCIPAL_KEYS[field]) ?? '';

  return {
    ...buildReportInfo(collected, VARIANTS.lobbyist.defaultReportType),
    principal: {
      name: principalField('name'),
      phone: principalField('phone'),
      streetAddress: principalField('streetAddress'),
      city: principalField('city'),
      state: principalField('state'),
      zip: principalField('zip'),
    },
  };
};
