/**
 * Address Decomposer
 *
 * US addresses only. Comma segments give street and city; the segment after
 * the city must start with `ST 12345` (or `ST 12345-6789`) for any field to
 * be filled.
 */

import usStates from './us-states.json';

import { cleanText } from '@/modules/document/index.js';

import type { Address } from './types.js';

const STATE_ZIP_RE = /^([A-Z]{2})\s+(\d{5}(?:-\d{4})?)/;
const COMMA_STATE_RE = /,\s*([A-Z]{2})\s+\d{5}/;
const LOOSE_STATE_RE = /\b([A-Z]{2})\s*\d{5}/;
const TRAILING_STATE_RE = new RegExp(
  `\\b(${usStates.join('|')})(?:\\s+\\d{5}(?:-\\d{4})?)?\\s*$`,
  'i'
);
const EDGE_NON_LETTERS_RE = /^[^a-zA-Z]+|[^a-zA-Z]+$/g;

export const EMPTY_ADDRESS: Address = { street: '', city: '', state: '', zip: '' };

const withStateZip = (street: string, city: string, segment: string): Address => {
  const match = STATE_ZIP_RE.exec(segment);
  if (match === null) {
    return EMPTY_ADDRESS;
  }
  return { street, city, state: match[1] ?? '', zip: match[2] ?? '' };
};

/**
 * Splits a free-text address into its parts.
 *
 * @example
 * parseAddress('123 Main St, Salt Lake City, UT 84101')
 * // { street: '123 Main St', city: 'Salt Lake City', state: 'UT', zip: '84101' }
 */
export const parseAddress = (text: string): Address => {
  const segments = cleanText(text)
    .split(',')
    .map((segment) => segment.trim());

  const [first = '', second = '', third = ''] = segments;

  if (segments.length >= 3) {
    return withStateZip(first, second, third);
  }
  if (segments.length === 2) {
    return withStateZip('', first, second);
  }
  return EMPTY_ADDRESS;
};

/**
 * Two-letter state code written before a ZIP code, or null.
 * `, UT 84101` is preferred over a bare `UT84101` anywhere in the text.
 */
export const extractStateCode = (address: string): string | null => {
  const strict = COMMA_STATE_RE.exec(address)?.[1];
  if (strict !== undefined) return strict;

  return LOOSE_STATE_RE.exec(address)?.[1] ?? null;
};

/**
 * Short `City, ST` label for display.
 *
 * The state must close the address (a ZIP may follow it). The city is the
 * last comma segment before the state; a single unstructured segment of more
 * than three words is assumed to end with a two-word city. This is a
 * heuristic and misreads one- and three-word city names in that case.
 *
 * @returns `City, ST`, `ST` when no city is left, `N/A` without a state
 */
export const formatCityState = (address: string): string => {
  const text = cleanText(address);
  const match = TRAILING_STATE_RE.exec(text);
  const code = match?.[1];
  if (match === null || code === undefined) {
    return 'N/A';
  }

  const state = code.toUpperCase();
  const segments = text
    .slice(0, match.index)
    .split(',')
    .map((segment) => segment.trim())
    .filter((segment) => segment !== '');

  let city = segments[segments.length - 1] ?? '';
  if (segments.length === 1) {
    const words = city.split(' ');
    if (words.length > 3) {
      city = words.slice(-2).join(' ');
    }
  }

  city = city.replace(EDGE_NON_LETTERS_RE, '');
  return city === '' ? state : `${city}, ${state}`;
};
