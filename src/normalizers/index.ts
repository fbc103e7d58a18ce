import type { ExtractionResult, Transaction } from '../types/output.js';
import { compareDates } from '../utils/date.js';

export type SortKey = 'date' | 'value' | 'description';

export const SORT_KEYS: readonly SortKey[] = ['date', 'value', 'description'];

const COMPARATORS: Record<SortKey, (a: Transaction, b: Transaction) => number> = {
  date: (a, b) => compareDates(a.date, b.date),
  value: (a, b) => a.value - b.value,
  description: (a, b) => a.description.localeCompare(b.description),
};

export function sortTransactions(transactions: readonly Transaction[], key: SortKey): Transaction[] {
  return [...transactions].sort(COMPARATORS[key]);
}

/**
 * Post-processing sort of a result. Ties keep statement order; totals are untouched.
 */
export function sortResult(result: ExtractionResult, key: SortKey): ExtractionResult {
  return Object.freeze({
    transactions: Object.freeze(sortTransactions(result.transactions, key)),
    subtotals: result.subtotals,
    grandTotal: result.grandTotal,
  });
}

export function isSortKey(value: string): value is SortKey {
  return SORT_KEYS.some((key) => key === value);
}
