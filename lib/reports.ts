// Report aggregation over the ledger's transactions
import type { Transaction } from '@/types/ledger';
import { sortByDateDesc } from './ledger/store';
import { roundToCents } from './utils';

export interface MonthlyNet {
  month: string; // YYYY-MM format
  net: number;
}

export interface CategoryTotal {
  category: string;
  total: number;
}

function sumBy(transactions: Transaction[], keyOf: (txn: Transaction) => string): Map<string, number> {
  const totals = new Map<string, number>();
  for (const txn of transactions) {
    const key = keyOf(txn);
    totals.set(key, (totals.get(key) ?? 0) + txn.amount);
  }
  return totals;
}

/**
 * Net amount per calendar month (income and expenses offset), oldest month first.
 *
 * @example
 * monthlySummary([
 *   { date: '2025-11-01', amount: 1500, ... },
 *   { date: '2025-11-24', amount: -250, ... },
 *   { date: '2025-10-05', amount: -40, ... },
 * ])
 * // [{ month: '2025-10', net: -40 }, { month: '2025-11', net: 1250 }]
 */
export function monthlySummary(transactions: Transaction[]): MonthlyNet[] {
  const totals = sumBy(transactions, txn => txn.date.slice(0, 7));
  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, net]) => ({ month, net: roundToCents(net) }));
}

/**
 * Total per category (exact, case-sensitive match). Largest absolute total
 * first; equal totals are ordered by category name.
 */
export function categoryBreakdown(transactions: Transaction[]): CategoryTotal[] {
  const totals = sumBy(transactions, txn => txn.category);
  return [...totals.entries()]
    .map(([category, total]) => ({ category, total: roundToCents(total) }))
    .sort((a, b) => {
      const byMagnitude = Math.abs(b.total) - Math.abs(a.total);
      if (byMagnitude !== 0) return byMagnitude;
      return a.category < b.category ? -1 : a.category > b.category ? 1 : 0;
    });
}

/**
 * The n most recently dated transactions, in list order.
 */
export function latestTransactions(transactions: Transaction[], n: number): Transaction[] {
  if (n <= 0) return [];
  return sortByDateDesc(transactions).slice(0, n);
}
