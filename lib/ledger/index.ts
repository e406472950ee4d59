export { LedgerStore, sortByDateDesc } from './store';
export type { OpenedStore } from './store';
export {
  loadLedger,
  saveLedger,
  parseLedgerDocument,
  serializeLedger,
  quarantineLedgerFile,
  getQuarantinePath,
} from './storage';
export {
  LedgerError,
  TransactionNotFoundError,
  InvalidTransactionError,
  LedgerPersistenceError,
  isLedgerError,
} from './errors';
export type { LedgerErrorKind } from './errors';
