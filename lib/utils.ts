import { format } from 'date-fns';
import type { TransactionType } from '@/types/ledger';

/**
 * Today's local calendar date as YYYY-MM-DD.
 * Formats local components rather than Date.toISOString(), which would give
 * the UTC date.
 */
export function todayYMD(): string {
  return format(new Date(), 'yyyy-MM-dd');
}

/**
 * Round to whole cents so that sums like 0.1 + 0.2 print as 0.3.
 */
export function roundToCents(amount: number): number {
  const rounded = Math.round(amount * 100) / 100;
  // Avoid -0 leaking into reports and JSON
  return rounded === 0 ? 0 : rounded;
}

/**
 * Store expenses as negative magnitudes and income as positive ones.
 */
export function signedAmount(type: TransactionType, amount: number): number {
  const magnitude = Math.abs(amount);
  if (magnitude === 0) return 0;
  return type === 'expense' ? -magnitude : magnitude;
}

/**
 * Format a signed amount for console output, e.g. "+1500.00" or "-45.50".
 */
export function formatAmount(amount: number): string {
  const sign = amount < 0 ? '-' : '+';
  return `${sign}${Math.abs(amount).toFixed(2)}`;
}
