// Ledger backups and file statistics
import fs from 'fs';
import path from 'path';
import type { Ledger } from '@/types/ledger';
import { fileTimestamp, formatBytes, getBackupsDir } from './utils';

export interface BackupInfo {
  path: string;
  name: string;
  size: number;
  created: Date;
}

export interface LedgerStats {
  transactionCount: number;
  incomeCount: number;
  expenseCount: number;
  earliestDate: string | null;
  latestDate: string | null;
  fileSize: number;
  fileSizeLabel: string;
}

/**
 * Copy the ledger file into the backups directory
 * @param prefix File name prefix, e.g. 'pre-reset' before a reset
 * @returns The backup file path
 */
export function createBackup(ledgerPath: string, prefix = 'budget-backup'): string {
  if (!fs.existsSync(ledgerPath)) {
    throw new Error(`Ledger file not found: ${ledgerPath}`);
  }

  const backupsDir = getBackupsDir(ledgerPath);
  if (!fs.existsSync(backupsDir)) {
    fs.mkdirSync(backupsDir, { recursive: true });
  }

  const backupPath = path.join(backupsDir, `${prefix}-${fileTimestamp()}.json`);
  fs.copyFileSync(ledgerPath, backupPath);

  return backupPath;
}

/**
 * List available backups, newest first
 */
export function listBackups(ledgerPath: string): BackupInfo[] {
  const backupsDir = getBackupsDir(ledgerPath);
  if (!fs.existsSync(backupsDir)) {
    return [];
  }

  return fs.readdirSync(backupsDir)
    .filter(f => f.endsWith('.json'))
    .map(name => {
      const filePath = path.join(backupsDir, name);
      const stats = fs.statSync(filePath);
      return {
        path: filePath,
        name,
        size: stats.size,
        created: stats.mtime,
      };
    })
    .sort((a, b) => {
      const byTime = b.created.getTime() - a.created.getTime();
      if (byTime !== 0) return byTime;
      return a.name < b.name ? 1 : a.name > b.name ? -1 : 0;
    });
}

/**
 * Get ledger file size in bytes
 */
export function getLedgerFileSize(ledgerPath: string): number {
  if (!fs.existsSync(ledgerPath)) {
    return 0;
  }
  return fs.statSync(ledgerPath).size;
}

export function getLedgerStats(ledger: Ledger, ledgerPath: string): LedgerStats {
  const dates = ledger.transactions.map(txn => txn.date).sort();
  const fileSize = getLedgerFileSize(ledgerPath);

  return {
    transactionCount: ledger.transactions.length,
    incomeCount: ledger.transactions.filter(txn => txn.type === 'income').length,
    expenseCount: ledger.transactions.filter(txn => txn.type === 'expense').length,
    earliestDate: dates[0] ?? null,
    latestDate: dates[dates.length - 1] ?? null,
    fileSize,
    fileSizeLabel: formatBytes(fileSize),
  };
}
