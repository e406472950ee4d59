// Shared utilities for data management operations
import path from 'path';
import { BACKUPS_DIR_NAME } from '../constants';

/**
 * Get the backups directory path relative to the ledger file path
 */
export function getBackupsDir(ledgerPath: string): string {
  return path.join(path.dirname(ledgerPath), BACKUPS_DIR_NAME);
}

/**
 * Timestamp safe for use in file names, e.g. 2025-01-15T00-00-00-000Z
 */
export function fileTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';
  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}
