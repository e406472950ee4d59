// CSV export of ledger transactions using papaparse
import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import type { Transaction } from '@/types/ledger';
import { todayYMD } from '../utils';

export const CSV_HEADERS = ['Date', 'Type', 'Category', 'Amount', 'Notes'];

/**
 * Build CSV text for the given transactions, in the order given.
 */
export function exportTransactionsCsv(transactions: Transaction[]): string {
  const rows = transactions.map(txn => [
    txn.date,
    txn.type,
    txn.category,
    txn.amount.toFixed(2),
    txn.notes ?? '',
  ]);

  const csv = Papa.unparse({ fields: CSV_HEADERS, data: rows }, { newline: '\n' });
  // unparse ends a header-only document with a newline
  return csv.endsWith('\n') ? csv.slice(0, -1) : csv;
}

/**
 * Write the CSV export into a directory
 * @returns The written file path
 */
export function writeTransactionsCsv(transactions: Transaction[], dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const filePath = path.join(dir, `budget-transactions-${todayYMD()}.csv`);
  fs.writeFileSync(filePath, exportTransactionsCsv(transactions) + '\n', 'utf-8');

  return filePath;
}
