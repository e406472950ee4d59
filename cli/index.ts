// Entry point: open the ledger and run the interactive menu
import { getDataDir, getLedgerPath } from '@/lib/config';
import { LedgerStore } from '@/lib/ledger';
import { runMenu } from './menu';
import { createConsolePrompter } from './prompter';

async function main(): Promise<void> {
  const ledgerPath = getLedgerPath();
  const { store, load } = LedgerStore.open(ledgerPath);
  const prompter = createConsolePrompter();

  if (load.status === 'recovered') {
    prompter.print(load.quarantinePath
      ? `Warning: data file was corrupt and moved to: ${load.quarantinePath}`
      : 'Warning: data file was corrupt and could not be moved aside. Starting with an empty ledger.');
  }

  try {
    await runMenu({ store, prompter, exportDir: getDataDir() });
  } finally {
    prompter.close();
  }
}

main().catch(error => {
  console.error('Budget planner failed:', error);
  process.exitCode = 1;
});
