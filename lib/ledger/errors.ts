// Error types raised by the ledger store

export type LedgerErrorKind = 'InvalidInput' | 'NotFound' | 'PersistenceFailure';

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;

  constructor(kind: LedgerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.kind = kind;
  }
}

export class TransactionNotFoundError extends LedgerError {
  readonly id: number;

  constructor(id: number) {
    super('NotFound', `Transaction not found: ${id}`);
    this.name = 'TransactionNotFoundError';
    this.id = id;
  }
}

export class InvalidTransactionError extends LedgerError {
  constructor(message: string) {
    super('InvalidInput', message);
    this.name = 'InvalidTransactionError';
  }
}

/**
 * Writing or renaming the ledger file failed. The target file and the
 * in-memory ledger are left as they were before the save.
 */
export class LedgerPersistenceError extends LedgerError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PersistenceFailure', `Failed to save ledger to ${filePath}: ${detail}`, { cause });
    this.name = 'LedgerPersistenceError';
    this.filePath = filePath;
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
