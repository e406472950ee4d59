// Ledger store: in-memory CRUD over the transaction list with a save after every change
import {
  createEmptyLedger,
  type CreateTransactionInput,
  type Ledger,
  type LoadResult,
  type Transaction,
  type TransactionPatch,
} from '@/types/ledger';
import { createTransactionSchema, transactionPatchSchema } from '../validations';
import { RESET_CONFIRMATION } from '../constants';
import { signedAmount, todayYMD } from '../utils';
import { InvalidTransactionError, TransactionNotFoundError } from './errors';
import { loadLedger, saveLedger } from './storage';

export interface OpenedStore {
  store: LedgerStore;
  load: LoadResult;
}

function copyLedger(ledger: Ledger): Ledger {
  return {
    next_id: ledger.next_id,
    transactions: ledger.transactions.map(txn => ({ ...txn })),
  };
}

/**
 * Sort by date descending. Array.prototype.sort is stable, so transactions
 * on the same date keep their insertion order.
 */
export function sortByDateDesc(transactions: Transaction[]): Transaction[] {
  return [...transactions].sort((a, b) => {
    if (a.date === b.date) return 0;
    return a.date < b.date ? 1 : -1;
  });
}

/**
 * Owns one ledger file. It is the only place ids are assigned and the only
 * writer of the file.
 */
export class LedgerStore {
  private ledger: Ledger;

  constructor(readonly filePath: string, ledger: Ledger = createEmptyLedger()) {
    this.ledger = copyLedger(ledger);
  }

  /**
   * Load the ledger file (recovering from a corrupt one) and wrap it in a store.
   */
  static open(filePath: string): OpenedStore {
    const load = loadLedger(filePath);
    return { store: new LedgerStore(filePath, load.ledger), load };
  }

  get nextId(): number {
    return this.ledger.next_id;
  }

  get size(): number {
    return this.ledger.transactions.length;
  }

  /**
   * Copy of the ledger in insertion order.
   */
  snapshot(): Ledger {
    return copyLedger(this.ledger);
  }

  /**
   * Persist first, then swap the in-memory ledger, so a failed save leaves
   * the store as it was.
   */
  private commit(next: Ledger): void {
    saveLedger(this.filePath, next);
    this.ledger = next;
  }

  private indexOf(id: number): number {
    const index = this.ledger.transactions.findIndex(txn => txn.id === id);
    if (index === -1) {
      throw new TransactionNotFoundError(id);
    }
    return index;
  }

  create(input: CreateTransactionInput): Transaction {
    const parsed = createTransactionSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidTransactionError(parsed.error.issues[0]?.message ?? 'Invalid transaction');
    }
    const data = parsed.data;

    const txn: Transaction = {
      id: this.ledger.next_id,
      type: data.type,
      amount: signedAmount(data.type, data.amount),
      category: data.category,
      date: data.date ?? todayYMD(),
      notes: data.notes || null,
      created_at: new Date().toISOString(),
      updated_at: null,
    };

    const next = copyLedger(this.ledger);
    next.transactions.push(txn);
    next.next_id += 1;
    this.commit(next);

    return { ...txn };
  }

  get(id: number): Transaction {
    return { ...this.ledger.transactions[this.indexOf(id)] };
  }

  /**
   * Apply a partial update. The amount sign is re-derived from the final
   * type, so changing only the type flips the stored sign.
   */
  update(id: number, patch: TransactionPatch): Transaction {
    const index = this.indexOf(id);

    const parsed = transactionPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new InvalidTransactionError(parsed.error.issues[0]?.message ?? 'Invalid transaction update');
    }
    const data = parsed.data;

    const next = copyLedger(this.ledger);
    const current = next.transactions[index];
    const type = data.type ?? current.type;

    const updated: Transaction = {
      ...current,
      type,
      amount: signedAmount(type, data.amount ?? current.amount),
      category: data.category ?? current.category,
      date: data.date ?? current.date,
      notes: data.notes === undefined ? current.notes : data.notes || null,
      updated_at: new Date().toISOString(),
    };
    next.transactions[index] = updated;
    this.commit(next);

    return { ...updated };
  }

  delete(id: number): Transaction {
    const index = this.indexOf(id);
    const next = copyLedger(this.ledger);
    const [removed] = next.transactions.splice(index, 1);
    this.commit(next);
    return removed;
  }

  /**
   * All transactions, newest date first.
   */
  list(): Transaction[] {
    return sortByDateDesc(this.ledger.transactions).map(txn => ({ ...txn }));
  }

  /**
   * Clear every transaction and restart ids at 1. Does nothing (and writes
   * nothing) unless the confirmation token matches exactly.
   */
  reset(confirmation: string | undefined): boolean {
    if (confirmation !== RESET_CONFIRMATION) {
      return false;
    }
    this.commit(createEmptyLedger());
    return true;
  }
}
