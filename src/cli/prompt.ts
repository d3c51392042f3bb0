/**
 * src/cli/prompt.ts
 *
 * WHY:
 * - The menu talks to a Prompt, not to stdin/stdout, so sessions can be scripted in tests.
 *
 * RULES:
 * - ask() resolves null at end of input; callers stop instead of looping.
 * - Lines come back untrimmed; the menu decides what whitespace means.
 */

import readline from 'node:readline';

export interface Prompt {
  ask(question: string): Promise<string | null>;
  print(line?: string): void;
  printError(line: string): void;
  close(): void;
}

export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
  errorOutput: NodeJS.WritableStream = process.stderr,
): Prompt {
  const rl = readline.createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question) {
      output.write(question);
      const next = await lines.next();
      if (next.done) return null;
      return next.value;
    },
    print(line = '') {
      output.write(`${line}\n`);
    },
    printError(line) {
      errorOutput.write(`${line}\n`);
    },
    close() {
      rl.close();
    },
  };
}
