/**
 * Registration Field Mapper
 *
 * Entity and lobbyist registration pages are flat label/value forms. Each
 * kind has its own rule table; everything else on the page stays in the raw
 * field map.
 */

import { extractOfficers, extractPrincipals, assembleName } from './blocks.js';
import { parseFilingDate } from './dates.js';
import { contains, exact, forAttr, promoteFields, type FieldRule } from './field-rules.js';
import { extractLabelValues } from './label-values.js';

import type { EntityRegistration, FilingMeta, LobbyistRegistration } from './types.js';
import type { FilingDocument } from '@/modules/document/index.js';

type EntityField =
  | 'name'
  | 'alsoKnownAs'
  | 'dateCreated'
  | 'entityType'
  | 'status'
  | 'streetAddress'
  | 'suitePoBox'
  | 'city'
  | 'state'
  | 'zip';

export const ENTITY_RULES: readonly FieldRule<EntityField>[] = [
  { field: 'name', match: [forAttr('Name'), exact('Name')] },
  { field: 'alsoKnownAs', match: [forAttr('AlsoKnownAs'), exact('Also known as')] },
  { field: 'dateCreated', match: [forAttr('DateCreated'), exact('Date Created')] },
  { field: 'entityType', match: [exact('Type'), exact('Entity Type'), exact('Registration Type')] },
  { field: 'status', match: [exact('Status')] },
  { field: 'streetAddress', match: [exact('Street Address')] },
  { field: 'suitePoBox', match: [exact('Suite/PO Box')] },
  { field: 'city', match: [exact('City')] },
  { field: 'state', match: [exact('State')] },
  { field: 'zip', match: [exact('Zip')] },
];

type LobbyistField =
  | 'firstName'
  | 'lastName'
  | 'phone'
  | 'registrationDate'
  | 'organizationName'
  | 'streetAddress'
  | 'city'
  | 'state'
  | 'zip'
  | 'principalName'
  | 'lobbyingPurposes';

export const LOBBYIST_RULES: readonly FieldRule<LobbyistField>[] = [
  { field: 'firstName', match: [contains('First Name')] },
  { field: 'lastName', match: [contains('Last Name')] },
  { field: 'phone', match: [exact('Telephone')] },
  { field: 'registrationDate', match: [contains('Registration Date')] },
  { field: 'organizationName', match: [contains('Organization Name')] },
  { field: 'streetAddress', match: [exact('Street Address')] },
  { field: 'city', match: [exact('City')] },
  { field: 'state', match: [exact('State')] },
  { field: 'zip', match: [exact('Zip')] },
  { field: 'principalName', match: [contains('Principal Name')] },
  { field: 'lobbyingPurposes', match: [contains('General Purposes'), contains('Nature')] },
];

export const extractEntityRegistration = (
  doc: FilingDocument,
  meta: FilingMeta
): EntityRegistration => {
  const { fields, labels } = extractLabelValues(doc);
  const f = promoteFields(labels, ENTITY_RULES);

  return {
    kind: 'entity_registration',
    entityId: meta.id,
    sourceUrl: meta.sourceUrl,
    name: f.name ?? '',
    alsoKnownAs: f.alsoKnownAs ?? '',
    entityType: f.entityType ?? '',
    status: f.status ?? '',
    dateCreated: parseFilingDate(f.dateCreated ?? ''),
    address: {
      street: f.streetAddress ?? '',
      suitePoBox: f.suitePoBox ?? '',
      city: f.city ?? '',
      state: f.state ?? '',
      zip: f.zip ?? '',
    },
    officers: extractOfficers(doc),
    fields: fields.toRecord(),
  };
};

/**
 * Display name: the lobbyist's own name, else the organization, else the
 * principal.
 */
export const extractLobbyistRegistration = (
  doc: FilingDocument,
  meta: FilingMeta
): LobbyistRegistration => {
  const { fields, labels } = extractLabelValues(doc);
  const f = promoteFields(labels, LOBBYIST_RULES);

  const name =
    assembleName([f.firstName, f.lastName]) || (f.organizationName ?? f.principalName ?? '');

  return {
    kind: 'lobbyist_registration',
    entityId: meta.id,
    sourceUrl: meta.sourceUrl,
    entityType: 'Lobbyist',
    name,
    firstName: f.firstName ?? '',
    lastName: f.lastName ?? '',
    phone: f.phone ?? '',
    organizationName: f.organizationName ?? '',
    registrationDate: parseFilingDate(f.registrationDate ?? ''),
    address: {
      street: f.streetAddress ?? '',
      city: f.city ?? '',
      state: f.state ?? '',
      zip: f.zip ?? '',
    },
    principalName: f.principalName ?? '',
    lobbyingPurposes: f.lobbyingPurposes ?? '',
    principals: extractPrincipals(doc),
    fields: fields.toRecord(),
  };
};
