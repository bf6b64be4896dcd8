import { Decimal } from 'decimal.js';

import { extractStateCode } from '@/modules/extraction/index.js';

import type { InStateShare } from './types.js';

interface AddressedAmount {
  readonly address: string;
  readonly amount: Decimal;
}

const percentOf = (part: Decimal, total: Decimal): number =>
  total.isZero() ? 0 : part.div(total).mul(100).toDecimalPlaces(1).toNumber();

/**
 * Splits contribution totals by whether the contributor's address is in the
 * home state.
 */
export const summarizeInStateShare = (
  contributions: readonly AddressedAmount[],
  homeState: string
): InStateShare => {
  const home = homeState.toUpperCase();
  let inState = new Decimal(0);
  let outOfState = new Decimal(0);
  let unknown = new Decimal(0);

  for (const { address, amount } of contributions) {
    const state = extractStateCode(address);
    if (state === null) {
      unknown = unknown.plus(amount);
    } else if (state === home) {
      inState = inState.plus(amount);
    } else {
      outOfState = outOfState.plus(amount);
    }
  }

  const total = inState.plus(outOfState).plus(unknown);
  return {
    inState,
    outOfState,
    unknown,
    total,
    inStatePercent: percentOf(inState, total),
    outOfStatePercent: percentOf(outOfState, total),
    unknownPercent: percentOf(unknown, total),
  };
};
