/**
 * Prompt I/O for the console menu.
 *
 * Commands talk to a Prompter instead of stdin/stdout so the menu can be
 * driven by scripted answers in tests.
 */

import { createInterface } from 'readline/promises';

export interface Prompter {
  /** Resolves to null once input is closed (Ctrl-D, end of piped input, Ctrl-C). */
  ask(question: string): Promise<string | null>;
  print(message?: string): void;
  close(): void;
}

/**
 * Prompter backed by the process's stdin and stdout.
 */
export function createConsolePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;

  rl.on('close', () => {
    closed = true;
  });

  rl.on('SIGINT', () => {
    output.write('\nInterrupted. Exiting.\n');
    rl.close();
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) return Promise.resolve(null);

      return new Promise(resolve => {
        const onClose = () => resolve(null);
        rl.once('close', onClose);
        rl.question(question).then(
          answer => {
            rl.off('close', onClose);
            resolve(answer);
          },
          // question() rejects once the interface has been closed
          () => {
            rl.off('close', onClose);
            resolve(null);
          }
        );
      });
    },

    print(message = ''): void {
      output.write(message + '\n');
    },

    close(): void {
      if (!closed) rl.close();
    },
  };
}
