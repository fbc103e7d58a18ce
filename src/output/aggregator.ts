/**
 * Aggregation of matched transactions into per-keyword subtotals and a grand total.
 * All arithmetic is on integer cents.
 */

import { TotalsMismatchError } from '../errors.js';
import type { ExtractionResult, Keyword, Transaction } from '../types/output.js';
import { sumCents } from '../utils/money.js';

/**
 * Single pass in encounter order. Every snapshot keyword gets a subtotal entry, zero
 * when nothing matched it; a transaction tagged with a keyword outside the snapshot
 * gets an entry appended after them.
 */
export function aggregate(transactions: readonly Transaction[], keywords: readonly Keyword[]): ExtractionResult {
  const subtotals = new Map<Keyword, number>();
  for (const keyword of keywords) {
    subtotals.set(keyword, 0);
  }

  let grandTotal = 0;
  for (const txn of transactions) {
    subtotals.set(txn.matchedKeyword, (subtotals.get(txn.matchedKeyword) ?? 0) + txn.value);
    grandTotal += txn.value;
  }

  return Object.freeze({
    transactions: Object.freeze([...transactions]),
    subtotals,
    grandTotal,
  });
}

export function assertTotalsConsistent(result: ExtractionResult): void {
  const fromTransactions = sumCents(result.transactions.map((txn) => txn.value));
  const fromSubtotals = sumCents([...result.subtotals.values()]);

  if (!Number.isSafeInteger(result.grandTotal)) {
    throw new TotalsMismatchError(`grand total ${result.grandTotal} is not an exact cent amount`);
  }
  if (fromTransactions !== result.grandTotal) {
    throw new TotalsMismatchError(
      `grand total ${result.grandTotal} differs from transaction sum ${fromTransactions}`
    );
  }
  if (fromSubtotals !== result.grandTotal) {
    throw new TotalsMismatchError(
      `grand total ${result.grandTotal} differs from subtotal sum ${fromSubtotals}`
    );
  }
}
