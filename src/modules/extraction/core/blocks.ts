/**
 * Officer and principal blocks.
 *
 * Registration pages list officers and principals one after another with no
 * wrapping container; each block starts at a bold marker such as "Name of
 * Primary Officer". The document splits the page at those markers and the
 * rule tables below read each block's labels.
 */

import { parseAddress } from './address.js';
import { contains, exact, promoteFields, type FieldRule } from './field-rules.js';

import type { Officer, Principal } from './types.js';
import type { FilingDocument, SegmentSpec } from '@/modules/document/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Segment markers
// ─────────────────────────────────────────────────────────────────────────────

const ANY_NAME_MARKER_RE = /^Name of\b/;

export const OFFICER_SEGMENTS: SegmentSpec = {
  start: [
    /Name of Primary Officer/,
    /Name of additional/,
    /Name of the\b.*Chief Financial Officer/,
  ],
  boundary: [ANY_NAME_MARKER_RE],
};

export const PRINCIPAL_SEGMENTS: SegmentSpec = {
  start: [/Name of (?:the )?Principal/, /Name of additional Principal/],
  boundary: [ANY_NAME_MARKER_RE],
};

const TREASURER_MARKER_RE = /Chief Financial Officer|Treasurer/;

// ─────────────────────────────────────────────────────────────────────────────
// Field rules
// ─────────────────────────────────────────────────────────────────────────────

type OfficerField =
  | 'firstName'
  | 'middleName'
  | 'lastName'
  | 'title'
  | 'occupation'
  | 'phone'
  | 'email'
  | 'streetAddress'
  | 'suitePoBox'
  | 'city'
  | 'state'
  | 'zip'
  | 'address';

export const OFFICER_RULES: readonly FieldRule<OfficerField>[] = [
  { field: 'firstName', match: [contains('First')] },
  { field: 'middleName', match: [contains('Middle')] },
  { field: 'lastName', match: [contains('Last')] },
  { field: 'title', match: [exact('Title')] },
  { field: 'occupation', match: [exact('Occupation')] },
  { field: 'phone', match: [exact('Phone'), exact('Telephone')] },
  { field: 'email', match: [exact('Email'), exact('Email Address')] },
  { field: 'streetAddress', match: [exact('Street Address')] },
  { field: 'suitePoBox', match: [exact('Suite/PO Box')] },
  { field: 'city', match: [exact('City')] },
  { field: 'state', match: [exact('State')] },
  { field: 'zip', match: [exact('Zip')] },
  { field: 'address', match: [contains('Address')] },
];

type PrincipalField = 'name' | 'firstName' | 'middleName' | 'lastName' | 'contact' | 'phone' | 'address';

export const PRINCIPAL_RULES: readonly FieldRule<PrincipalField>[] = [
  { field: 'firstName', match: [contains('First')] },
  { field: 'middleName', match: [contains('Middle')] },
  { field: 'lastName', match: [contains('Last')] },
  { field: 'name', match: [exact('Name'), contains('Principal Name'), contains('Organization Name')] },
  { field: 'contact', match: [contains('Contact')] },
  { field: 'phone', match: [contains('Phone')] },
  { field: 'address', match: [contains('Address')] },
];

/**
 * Joins the non-empty name parts with single spaces.
 */
export const assembleName = (parts: readonly (string | undefined)[]): string =>
  parts.filter((part): part is string => part !== undefined && part !== '').join(' ');

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Officer blocks with a name, in page order. `order` is the position of the
 * block's marker, so a dropped block still takes up its position.
 */
export const extractOfficers = (doc: FilingDocument): Officer[] => {
  const officers: Officer[] = [];

  for (const segment of doc.segments(OFFICER_SEGMENTS)) {
    const f = promoteFields(segment.labels, OFFICER_RULES);
    const name = assembleName([f.firstName, f.middleName, f.lastName]);
    if (name === '') continue;

    const combined = parseAddress(f.address ?? '');
    officers.push({
      order: segment.index,
      isTreasurer: TREASURER_MARKER_RE.test(segment.marker),
      name,
      firstName: f.firstName ?? '',
      middleName: f.middleName ?? '',
      lastName: f.lastName ?? '',
      title: f.title ?? '',
      occupation: f.occupation ?? '',
      phone: f.phone ?? '',
      email: f.email ?? '',
      address: {
        street: f.streetAddress ?? combined.street,
        suitePoBox: f.suitePoBox ?? '',
        city: f.city ?? combined.city,
        state: f.state ?? combined.state,
        zip: f.zip ?? combined.zip,
      },
    });
  }

  return officers;
};

const principalsFromBlocks = (doc: FilingDocument): Principal[] => {
  const principals: Principal[] = [];

  for (const segment of doc.segments(PRINCIPAL_SEGMENTS)) {
    const f = promoteFields(segment.labels, PRINCIPAL_RULES);
    const name = assembleName([f.firstName, f.middleName, f.lastName]) || (f.name ?? '');
    if (name === '') continue;

    principals.push({
      order: segment.index,
      name,
      contact: f.contact ?? '',
      phone: f.phone ?? '',
      address: f.address ?? '',
    });
  }

  return principals;
};

const principalsFromTables = (doc: FilingDocument): Principal[] => {
  const principals: Principal[] = [];

  for (const table of doc.tablesByHeaderKeyword('Principal', { selector: 'table' })) {
    for (const row of table.rows) {
      const name = row[0]?.text ?? '';
      if (row.length < 2 || name === '') continue;

      principals.push({
        order: principals.length,
        name,
        contact: row[1]?.text ?? '',
        phone: '',
        address: '',
      });
    }
  }

  return principals;
};

/**
 * Principals of a lobbyist registration: marker blocks when the page has
 * them, otherwise rows of principal tables.
 */
export const extractPrincipals = (doc: FilingDocument): Principal[] => {
  const fromBlocks = principalsFromBlocks(doc);
  return fromBlocks.length > 0 ? fromBlocks : principalsFromTables(doc);
};
