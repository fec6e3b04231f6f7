/**
 * Shared entry-point and terminal helpers for the scripts.
 */

import readline from 'readline';
import { describeError } from './errors';

export interface LineReader {
  /** Print the prompt and resolve with the next line, or null at end of input. */
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

/**
 * Line reader over a stream. Lines are buffered, so piped input that arrives
 * before a prompt is shown is not lost.
 */
export function createLineReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): LineReader {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(prompt: string): Promise<string | null> {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close() {
      rl.close();
    },
  };
}

/** Run an async entry point; report failures and set a non-zero exit code. */
export function runMain(main: () => Promise<void>): void {
  main().catch((error: unknown) => {
    console.error(`\n❌ ${describeError(error)}`);
    process.exitCode = 1;
  });
}
