// Data file locations for the budget ledger
import path from 'path';
import { DEFAULT_DATA_FILE } from './constants';

/**
 * Directory holding the ledger, backups and recovered files.
 * BUDGET_DATA_DIR overrides the default of ./data under the working directory.
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.BUDGET_DATA_DIR || path.join(process.cwd(), 'data');
}

/**
 * Full path of the ledger JSON file (BUDGET_DATA_FILE names the file).
 */
export function getLedgerPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getDataDir(env), env.BUDGET_DATA_FILE || DEFAULT_DATA_FILE);
}
