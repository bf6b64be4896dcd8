import { Decimal } from 'decimal.js';

import type { CounterpartyTotal } from './types.js';

export interface AggregateOptions {
  /** Keep only the largest N totals */
  limit?: number;
  /** Counterparty name left out, usually the entity itself */
  exclude?: string;
}

interface CounterpartyAmount {
  readonly counterparty: string;
  readonly amount: Decimal;
}

const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Sums amounts per counterparty, largest total first (ties by name).
 * Blank names are skipped.
 */
export const aggregateByCounterparty = (
  transactions: readonly CounterpartyAmount[],
  options: AggregateOptions = {}
): CounterpartyTotal[] => {
  const totals = new Map<string, Decimal>();

  for (const { counterparty, amount } of transactions) {
    if (counterparty === '' || counterparty === options.exclude) continue;
    totals.set(counterparty, (totals.get(counterparty) ?? new Decimal(0)).plus(amount));
  }

  const sorted = [...totals]
    .map(([name, total]) => ({ name, total }))
    .sort((a, b) => b.total.comparedTo(a.total) || compareNames(a.name, b.name));

  return options.limit === undefined ? sorted : sorted.slice(0, Math.max(0, options.limit));
};
