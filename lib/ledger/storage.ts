/**
 * Ledger file storage
 *
 * Reads the ledger JSON document, quarantines files that cannot be read as a
 * ledger, and writes the document atomically (temp file + fsync + rename).
 */

import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { createEmptyLedger, type Ledger, type LoadResult } from '@/types/ledger';
import { ledgerDocumentSchema } from '../validations';
import { CORRUPT_FILE_SUFFIX } from '../constants';
import { LedgerPersistenceError } from './errors';

export type DocumentParseResult =
  | { success: true; ledger: Ledger }
  | { success: false; reason: string };

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse raw file content into a ledger, reporting why it was rejected.
 */
export function parseLedgerDocument(raw: string): DocumentParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { success: false, reason: `invalid JSON: ${detail}` };
  }

  const result = ledgerDocumentSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, reason: `${where}${issue?.message ?? 'invalid ledger document'}` };
  }

  return { success: true, ledger: result.data };
}

/**
 * Serialize the ledger with a fixed field order and two-space indent.
 * Keys absent from a loaded record stay absent: JSON.stringify drops undefined.
 */
export function serializeLedger(ledger: Ledger): string {
  const doc = {
    next_id: ledger.next_id,
    transactions: ledger.transactions.map(txn => ({
      id: txn.id,
      type: txn.type,
      amount: txn.amount,
      category: txn.category,
      date: txn.date,
      notes: txn.notes,
      created_at: txn.created_at,
      updated_at: txn.updated_at,
    })),
  };
  return JSON.stringify(doc, null, 2) + '\n';
}

/**
 * Path a corrupt ledger file is moved to.
 */
export function getQuarantinePath(filePath: string): string {
  return filePath + CORRUPT_FILE_SUFFIX;
}

/**
 * Move an unreadable ledger file aside, replacing any earlier quarantined copy.
 */
export function quarantineLedgerFile(filePath: string): string {
  const quarantinePath = getQuarantinePath(filePath);
  fs.renameSync(filePath, quarantinePath);
  return quarantinePath;
}

/**
 * Load the ledger from disk.
 *
 * A missing file yields an empty ledger. A file that is not valid JSON or
 * does not match the ledger schema is quarantined and an empty ledger is
 * returned with status 'recovered', even when the file cannot be moved.
 * Other read errors are thrown.
 */
export function loadLedger(filePath: string): LoadResult {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return { status: 'missing', ledger: createEmptyLedger() };
    }
    throw error;
  }

  const parsed = parseLedgerDocument(raw);
  if (parsed.success) {
    return { status: 'loaded', ledger: parsed.ledger };
  }

  let quarantinePath: string | null = null;
  try {
    quarantinePath = quarantineLedgerFile(filePath);
    console.warn(`Ledger file was corrupt (${parsed.reason}), moved to:`, quarantinePath);
  } catch (error) {
    console.error(`Ledger file was corrupt (${parsed.reason}) and could not be moved aside:`, error);
  }

  return {
    status: 'recovered',
    ledger: createEmptyLedger(),
    quarantinePath,
    reason: parsed.reason,
  };
}

function removeTempFile(tmpPath: string): void {
  try {
    fs.rmSync(tmpPath, { force: true });
  } catch (cleanupError) {
    console.error('Failed to remove temporary ledger file:', cleanupError);
  }
}

/**
 * Atomically save the ledger.
 *
 * The document is written to a temporary file in the target's directory,
 * synced, then renamed over the target. On failure the temporary file is
 * removed and the target keeps its previous content.
 */
export function saveLedger(filePath: string, ledger: Ledger): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}-${randomUUID()}.tmp`);
  let fd: number | null = null;

  try {
    fs.mkdirSync(dir, { recursive: true });
    fd = fs.openSync(tmpPath, 'w');
    fs.writeFileSync(fd, serializeLedger(ledger), 'utf-8');
    fs.fsyncSync(fd);
    fs.closeSync(fd);
    fd = null;
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    if (fd !== null) {
      try {
        fs.closeSync(fd);
      } catch (closeError) {
        console.error('Failed to close temporary ledger file:', closeError);
      }
    }
    removeTempFile(tmpPath);
    throw new LedgerPersistenceError(filePath, error);
  }
}
