// Ledger type definitions for the budget planner

// ============================================
// Type Constants (use these for runtime checks)
// ============================================

export const TRANSACTION_TYPES = ['income', 'expense'] as const;

export type TransactionType = typeof TRANSACTION_TYPES[number];

// ============================================
// Persisted Models
// ============================================

export interface Transaction {
  id: number;
  type: TransactionType;
  amount: number; // negative for expenses, positive for income
  category: string;
  date: string; // YYYY-MM-DD
  // An absent key and null are kept apart so a file round-trips unchanged
  notes?: string | null;
  created_at: string;
  updated_at?: string | null;
}

export interface Ledger {
  next_id: number;
  transactions: Transaction[];
}

// ============================================
// Input Types (for creating/updating records)
// ============================================

export interface CreateTransactionInput {
  type: TransactionType;
  amount: number;
  category: string;
  date?: string; // defaults to today
  notes?: string | null;
}

/**
 * Partial update. An undefined property keeps the current value;
 * `notes: null` clears the notes.
 */
export interface TransactionPatch {
  type?: TransactionType;
  amount?: number;
  category?: string;
  date?: string;
  notes?: string | null;
}

// ============================================
// Load results
// ============================================

export type LoadResult =
  | { status: 'loaded'; ledger: Ledger }
  | { status: 'missing'; ledger: Ledger }
  // quarantinePath is null when the corrupt file could not be moved aside
  | { status: 'recovered'; ledger: Ledger; quarantinePath: string | null; reason: string };

export function createEmptyLedger(): Ledger {
  return { next_id: 1, transactions: [] };
}
