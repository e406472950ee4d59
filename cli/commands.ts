/**
 * Console menu commands
 *
 * Each command reads its fields through the Prompter, validates them, and
 * calls the LedgerStore. Invalid input while adding reprompts; while updating
 * it keeps the current value.
 */

import type { Transaction, TransactionPatch, TransactionType } from '@/types/ledger';
import { LedgerStore, TransactionNotFoundError } from '@/lib/ledger';
import {
  parseAmountInput,
  parseDateInput,
  parseIdInput,
  parseTypeInput,
  type ParseResult,
} from '@/lib/validations';
import { categoryBreakdown, latestTransactions, monthlySummary } from '@/lib/reports';
import { createBackup, getLedgerStats, listBackups } from '@/lib/data/backups';
import { writeTransactionsCsv } from '@/lib/data/export';
import { formatAmount } from '@/lib/utils';
import {
  CLEAR_NOTES_TOKEN,
  DEFAULT_CATEGORY,
  DEFAULT_LATEST_COUNT,
  DEFAULT_TRANSACTION_TYPE,
  RESET_CONFIRMATION,
} from '@/lib/constants';
import type { Prompter } from './prompter';

export interface CommandContext {
  store: LedgerStore;
  prompter: Prompter;
  /** Directory CSV exports are written to */
  exportDir: string;
}

export type Command = (ctx: CommandContext) => Promise<void>;

// ----------------------- Input helpers -----------------------

/**
 * Ask until the answer parses. Returns null if input is closed.
 */
async function askUntilValid<T>(
  prompter: Prompter,
  question: string,
  parse: (answer: string) => ParseResult<T>
): Promise<T | null> {
  for (;;) {
    const answer = await prompter.ask(question);
    if (answer === null) return null;

    const result = parse(answer);
    if (result.success) return result.data;
    prompter.print(result.error.message);
  }
}

async function askId(prompter: Prompter, question: string): Promise<number | null> {
  const answer = await prompter.ask(question);
  if (answer === null) return null;

  const result = parseIdInput(answer);
  if (!result.success) {
    prompter.print(result.error.message);
    return null;
  }
  return result.data;
}

/**
 * One-line summary, e.g. "ID:3 | 2025-11-24 | Food | expense | -250.00 | Lunch"
 */
export function formatTransactionLine(txn: Transaction): string {
  const parts = [`ID:${txn.id}`, txn.date, txn.category, txn.type, formatAmount(txn.amount)];
  if (txn.notes) parts.push(txn.notes);
  return parts.join(' | ');
}

// ----------------------- CRUD commands -----------------------

export const addTransaction: Command = async ({ store, prompter }) => {
  prompter.print('\nAdd a new transaction (income or expense).');

  const type = await askUntilValid<TransactionType>(
    prompter,
    `Type (income/expense) [${DEFAULT_TRANSACTION_TYPE}]: `,
    answer => (answer.trim() === ''
      ? { success: true, data: DEFAULT_TRANSACTION_TYPE }
      : parseTypeInput(answer))
  );
  if (type === null) return;

  const amount = await askUntilValid(prompter, 'Amount: ', parseAmountInput);
  if (amount === null) return;

  const categoryAnswer = await prompter.ask(`Category (e.g. Food, Salary) [${DEFAULT_CATEGORY}]: `);
  if (categoryAnswer === null) return;
  const category = categoryAnswer.trim() || DEFAULT_CATEGORY;

  const date = await askUntilValid(prompter, 'Date (YYYY-MM-DD) [today]: ', answer => parseDateInput(answer));
  if (date === null) return;

  const notesAnswer = await prompter.ask('Notes (optional): ');
  if (notesAnswer === null) return;

  const txn = store.create({
    type,
    amount,
    category,
    date,
    notes: notesAnswer.trim() || null,
  });
  prompter.print(`Saved. Transaction id: ${txn.id}`);
};

function printTransactions(prompter: Prompter, transactions: Transaction[], heading: string): void {
  if (transactions.length === 0) {
    prompter.print('\nNo transactions yet. Add your first one!');
    return;
  }
  prompter.print(`\n${heading}`);
  for (const txn of transactions) {
    prompter.print(formatTransactionLine(txn));
  }
}

export const listTransactions: Command = async ({ store, prompter }) => {
  printTransactions(prompter, store.list(), 'Transactions:');
};

export const showLatest: Command = async ({ store, prompter }) => {
  const latest = latestTransactions(store.snapshot().transactions, DEFAULT_LATEST_COUNT);
  printTransactions(prompter, latest, `Latest ${DEFAULT_LATEST_COUNT} transactions:`);
};

export const viewTransaction: Command = async ({ store, prompter }) => {
  const id = await askId(prompter, 'Enter transaction id to view: ');
  if (id === null) return;

  let txn: Transaction;
  try {
    txn = store.get(id);
  } catch (error) {
    if (error instanceof TransactionNotFoundError) {
      prompter.print('Transaction not found.');
      return;
    }
    throw error;
  }

  prompter.print('\nTransaction details:');
  prompter.print(`id: ${txn.id}`);
  prompter.print(`type: ${txn.type}`);
  prompter.print(`amount: ${formatAmount(txn.amount)}`);
  prompter.print(`category: ${txn.category}`);
  prompter.print(`date: ${txn.date}`);
  prompter.print(`notes: ${txn.notes ?? '-'}`);
  prompter.print(`created_at: ${txn.created_at}`);
  prompter.print(`updated_at: ${txn.updated_at ?? '-'}`);
};

export const updateTransaction: Command = async ({ store, prompter }) => {
  const id = await askId(prompter, 'Enter transaction id to update: ');
  if (id === null) return;

  let current: Transaction;
  try {
    current = store.get(id);
  } catch (error) {
    if (error instanceof TransactionNotFoundError) {
      prompter.print('Transaction not found.');
      return;
    }
    throw error;
  }

  prompter.print('Leave blank to keep the current value.');
  const patch: TransactionPatch = {};

  const typeAnswer = await prompter.ask(`New type (income/expense) [${current.type}]: `);
  if (typeAnswer === null) return;
  if (typeAnswer.trim() !== '') {
    const result = parseTypeInput(typeAnswer);
    if (result.success) patch.type = result.data;
    else prompter.print('Invalid type. Keeping current.');
  }

  const amountAnswer = await prompter.ask(`New amount [${current.amount}]: `);
  if (amountAnswer === null) return;
  if (amountAnswer.trim() !== '') {
    const result = parseAmountInput(amountAnswer);
    if (result.success) patch.amount = result.data;
    else prompter.print('Invalid number. Keeping old amount.');
  }

  const categoryAnswer = await prompter.ask(`New category [${current.category}]: `);
  if (categoryAnswer === null) return;
  if (categoryAnswer.trim() !== '') patch.category = categoryAnswer.trim();

  const dateAnswer = await prompter.ask(`New date [${current.date}] (YYYY-MM-DD): `);
  if (dateAnswer === null) return;
  if (dateAnswer.trim() !== '') {
    const result = parseDateInput(dateAnswer);
    if (result.success) patch.date = result.data;
    else prompter.print('Invalid date format. Keeping old date.');
  }

  const notesAnswer = await prompter.ask(`New notes [${current.notes ?? ''}] ('${CLEAR_NOTES_TOKEN}' to clear): `);
  if (notesAnswer === null) return;
  const notes = notesAnswer.trim();
  if (notes === CLEAR_NOTES_TOKEN) patch.notes = null;
  else if (notes !== '') patch.notes = notes;

  store.update(id, patch);
  prompter.print('Transaction updated.');
};

export const deleteTransaction: Command = async ({ store, prompter }) => {
  const id = await askId(prompter, 'Enter transaction id to delete: ');
  if (id === null) return;

  try {
    store.delete(id);
  } catch (error) {
    if (error instanceof TransactionNotFoundError) {
      prompter.print('No transaction found with that id.');
      return;
    }
    throw error;
  }
  prompter.print('Deleted.');
};

// ----------------------- Reports -----------------------

export const showMonthlySummary: Command = async ({ store, prompter }) => {
  const months = monthlySummary(store.snapshot().transactions);
  if (months.length === 0) {
    prompter.print('\nNo transactions to summarize.');
    return;
  }
  prompter.print('\nMonthly summary (YYYY-MM -> Net):');
  for (const { month, net } of months) {
    prompter.print(`${month} -> ${net.toFixed(2)}`);
  }
};

export const showCategoryBreakdown: Command = async ({ store, prompter }) => {
  const categories = categoryBreakdown(store.snapshot().transactions);
  if (categories.length === 0) {
    prompter.print('\nNo transactions.');
    return;
  }
  prompter.print('\nCategory totals:');
  for (const { category, total } of categories) {
    prompter.print(`${category}: ${total.toFixed(2)}`);
  }
};

// ----------------------- Data management -----------------------

export const resetLedger: Command = async ({ store, prompter }) => {
  const answer = await prompter.ask(`Type ${RESET_CONFIRMATION} to permanently delete all data: `);
  const confirmation = answer?.trim();
  if (confirmation !== RESET_CONFIRMATION) {
    prompter.print('Cancelled.');
    return;
  }

  const hadData = store.size > 0;
  const backupPath = hadData ? createBackup(store.filePath, 'pre-reset') : null;
  store.reset(confirmation);

  prompter.print('All data removed.');
  if (backupPath) prompter.print(`Backup saved to: ${backupPath}`);
};

export const backupLedger: Command = async ({ store, prompter }) => {
  if (store.size === 0) {
    prompter.print('Nothing to back up yet.');
    return;
  }
  const backupPath = createBackup(store.filePath);
  prompter.print(`Backup saved to: ${backupPath}`);
};

export const exportCsv: Command = async ({ store, prompter, exportDir }) => {
  const transactions = store.list();
  const filePath = writeTransactionsCsv(transactions, exportDir);
  prompter.print(`Exported ${transactions.length} transactions to: ${filePath}`);
};

export const showStats: Command = async ({ store, prompter }) => {
  const stats = getLedgerStats(store.snapshot(), store.filePath);
  prompter.print('\nLedger stats:');
  prompter.print(`Transactions: ${stats.transactionCount} (${stats.incomeCount} income, ${stats.expenseCount} expense)`);
  prompter.print(`Date range: ${stats.earliestDate ?? '-'} to ${stats.latestDate ?? '-'}`);
  prompter.print(`File size: ${stats.fileSizeLabel}`);
  prompter.print(`Backups: ${listBackups(store.filePath).length}`);
};
