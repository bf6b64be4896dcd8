import { describe, expect, it } from 'vitest';

import { extractStateCode, formatCityState, parseAddress } from '@/modules/extraction/index.js';

describe('parseAddress', () => {
  it('splits street, city, state and zip', () => {
    expect(parseAddress('123 Main St, Salt Lake City, UT 84101')).toEqual({
      street: '123 Main St',
      city: 'Salt Lake City',
      state: 'UT',
      zip: '84101',
    });
  });

  it('reads city, state and zip without a street', () => {
    expect(parseAddress('Salt Lake City, UT 84101')).toEqual({
      street: '',
      city: 'Salt Lake City',
      state: 'UT',
      zip: '84101',
    });
  });

  it('accepts ZIP+4 codes', () => {
    expect(parseAddress('9 Oak Ave, Boise, ID 83702-1234').zip).toBe('83702-1234');
  });

  it('leaves every field empty without a recognisable state and zip', () => {
    const empty = { street: '', city: '', state: '', zip: '' };

    expect(parseAddress('123 Main St, Salt Lake City, Utah')).toEqual(empty);
    expect(parseAddress('123 Main St Salt Lake City UT 84101')).toEqual(empty);
    expect(parseAddress('')).toEqual(empty);
  });
});

describe('extractStateCode', () => {
  it('prefers a state after a comma', () => {
    expect(extractStateCode('PO Box 1 NY, UT 84101')).toBe('UT');
  });

  it('falls back to a state next to a zip anywhere', () => {
    expect(extractStateCode('12 Elm St Provo UT84601')).toBe('UT');
  });

  it('returns null without a zip code', () => {
    expect(extractStateCode('12 Elm St, Provo, Utah')).toBeNull();
  });
});

describe('formatCityState', () => {
  it('uses the last comma segment before the state', () => {
    expect(formatCityState('123 Main St, Salt Lake City, UT 84101')).toBe('Salt Lake City, UT');
  });

  it('matches the state case-insensitively', () => {
    expect(formatCityState('12 Elm St, Provo, ut')).toBe('Provo, UT');
  });

  it('takes the last two words of a long unstructured address', () => {
    expect(formatCityState('100 North Main Street Cedar City UT 84720')).toBe('Cedar City, UT');
  });

  it('trims non-letters around the city', () => {
    expect(formatCityState('Apt 4, #Ogden- UT')).toBe('Ogden, UT');
  });

  it('returns the state alone when no city is left', () => {
    expect(formatCityState('UT 84101')).toBe('UT');
  });

  it('returns N/A without a trailing state', () => {
    expect(formatCityState('12 Elm St, Provo')).toBe('N/A');
    expect(formatCityState('')).toBe('N/A');
  });
});
