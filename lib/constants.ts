/**
 * Application-wide constants
 */

// Ledger file defaults
export const DEFAULT_DATA_FILE = 'budget_data.json';
export const CORRUPT_FILE_SUFFIX = '.corrupt';
export const BACKUPS_DIR_NAME = 'backups';

// Reset must be confirmed by typing this exact token
export const RESET_CONFIRMATION = 'YES';

// Report defaults
export const DEFAULT_LATEST_COUNT = 5;

// Prompt defaults
export const DEFAULT_CATEGORY = 'Misc';
export const DEFAULT_TRANSACTION_TYPE = 'expense' as const;

// Typed into the notes prompt during an update to clear the notes
export const CLEAR_NOTES_TOKEN = '-';
