/**
 * Test utilities shared by the ledger, data and menu tests
 *
 * Tests run against a real temporary directory rather than a mocked fs, so
 * the atomic save and quarantine renames are exercised for real.
 *
 * USAGE:
 *   const dir = createTempDataDir('menu');
 *   const prompter = new ScriptedPrompter(['1', 'income', '1500', 'Salary', '2025-11-01', '', '0']);
 *   await runMenu({ store, prompter, exportDir: dir });
 *   expect(prompter.output).toContain('Saved. Transaction id: 1');
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Prompter } from '@/cli/prompter';

// Fixed timestamp for deterministic tests - use with vi.setSystemTime.
// Midday UTC keeps the local calendar date at 2025-01-15 in almost every timezone
export const TEST_TIMESTAMP = '2025-01-15T12:00:00.000Z';

/**
 * Prompter that answers from a fixed script and records everything printed.
 * Returns null (input closed) once the script runs out.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly output: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  print(message = ''): void {
    this.output.push(message);
  }

  close(): void {
    this.answers.length = 0;
  }
}

/**
 * Create an empty temporary data directory
 */
export function createTempDataDir(testName: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `budget-${testName}-`));
}

/**
 * Remove a temporary data directory and everything in it
 */
export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
