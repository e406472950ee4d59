// Interactive main menu for the budget planner
import { isLedgerError } from '@/lib/ledger';
import {
  addTransaction,
  backupLedger,
  deleteTransaction,
  exportCsv,
  listTransactions,
  resetLedger,
  showCategoryBreakdown,
  showLatest,
  showMonthlySummary,
  showStats,
  updateTransaction,
  viewTransaction,
  type Command,
  type CommandContext,
} from './commands';

export interface MenuEntry {
  key: string;
  label: string;
  run: Command;
}

export const MENU_ENTRIES: MenuEntry[] = [
  { key: '1', label: 'Add transaction', run: addTransaction },
  { key: '2', label: 'List transactions', run: listTransactions },
  { key: '3', label: 'View by id', run: viewTransaction },
  { key: '4', label: 'Update transaction', run: updateTransaction },
  { key: '5', label: 'Delete transaction', run: deleteTransaction },
  { key: '6', label: 'Monthly summary', run: showMonthlySummary },
  { key: '7', label: 'Category breakdown', run: showCategoryBreakdown },
  { key: '8', label: 'Show latest 5', run: showLatest },
  { key: '9', label: 'Reset (delete all) - DANGEROUS', run: resetLedger },
  { key: '10', label: 'Back up data file', run: backupLedger },
  { key: '11', label: 'Export CSV', run: exportCsv },
  { key: '12', label: 'Data file stats', run: showStats },
];

export const EXIT_KEY = '0';

export function renderMenu(entries: MenuEntry[] = MENU_ENTRIES): string {
  const lines = entries.map(entry => `${entry.key}) ${entry.label}`);
  return ['', '==== Simple Budget Planner ====', ...lines, `${EXIT_KEY}) Exit`, 'Choose: '].join('\n');
}

/**
 * Run one command, reporting failures without ending the session.
 * Ledger errors carry a user-facing message; anything else is logged too.
 */
async function runCommand(entry: MenuEntry, ctx: CommandContext): Promise<void> {
  try {
    await entry.run(ctx);
  } catch (error) {
    if (isLedgerError(error)) {
      ctx.prompter.print(`Error: ${error.message}`);
      return;
    }
    console.error(`${entry.label} failed:`, error);
    ctx.prompter.print(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Show the menu until the user exits or input closes.
 */
export async function runMenu(ctx: CommandContext): Promise<void> {
  const menu = renderMenu();

  for (;;) {
    const answer = await ctx.prompter.ask(menu);
    if (answer === null) {
      ctx.prompter.print('\nInput closed. Exiting.');
      return;
    }

    const choice = answer.trim();
    if (choice === EXIT_KEY) {
      ctx.prompter.print('Goodbye. Data saved.');
      return;
    }

    const entry = MENU_ENTRIES.find(e => e.key === choice);
    if (!entry) {
      ctx.prompter.print(`Please choose a number from 0 to ${MENU_ENTRIES.length}.`);
      continue;
    }

    await runCommand(entry, ctx);
  }
}
