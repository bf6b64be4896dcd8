import { Decimal } from 'decimal.js';

const CURRENCY_NOISE_RE = /[$,\s]/g;
const NUMERIC_RE = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * Parses a displayed currency amount such as `$1,250.00`.
 *
 * Anything that is not a plain number once `$`, `,` and whitespace are
 * removed (`--`, '' or free text) reads as zero.
 */
export const parseCurrency = (text: string): Decimal => {
  const cleaned = text.replace(CURRENCY_NOISE_RE, '');
  if (!NUMERIC_RE.test(cleaned)) {
    return new Decimal(0);
  }
  return new Decimal(cleaned);
};

export const sumAmounts = (amounts: Iterable<Decimal>): Decimal => {
  let total = new Decimal(0);
  for (const amount of amounts) {
    total = total.plus(amount);
  }
  return total;
};
