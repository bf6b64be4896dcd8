/**
 * Filing date parsing.
 *
 * Filings print dates as `M/D/YYYY`; some newer pages use ISO `YYYY-MM-DD`.
 * Anything else (blank, `--`, free text, impossible calendar dates) parses
 * to null and extraction carries on with the raw text.
 */

import type { FilingDate } from './types.js';

const US_DATE_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

const toIsoDate = (year: number, month: number, day: number): string | null => {
  if (year < 1) return null;

  // setUTCFullYear keeps years below 100 as written
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
};

/**
 * Parses date text into an ISO `YYYY-MM-DD` string, or null.
 */
export const parseIsoDate = (text: string): string | null => {
  const trimmed = text.trim();

  const us = US_DATE_RE.exec(trimmed);
  if (us !== null) {
    return toIsoDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  const iso = ISO_DATE_RE.exec(trimmed);
  if (iso !== null) {
    return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  return null;
};

export const parseFilingDate = (raw: string): FilingDate => ({
  raw: raw.trim(),
  value: parseIsoDate(raw),
});

export const EMPTY_DATE: FilingDate = { raw: '', value: null };

/**
 * Whether the date had text that could not be parsed.
 */
export const isUnparsedDate = (date: FilingDate): boolean => date.raw !== '' && date.value === null;
