import type { Prompt } from '../../src/cli/prompt';

/**
 * Prompt that answers from a fixed list and records everything printed.
 * Once the answers run out, ask() reports end of input.
 */
export class ScriptedPrompt implements Prompt {
  readonly questions: string[] = [];
  readonly lines: string[] = [];
  readonly errors: string[] = [];
  closed = false;

  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  ask(question: string): Promise<string | null> {
    this.questions.push(question);
    const next = this.answers.shift();
    return Promise.resolve(next === undefined ? null : next);
  }

  print(line = ''): void {
    this.lines.push(line);
  }

  printError(line: string): void {
    this.errors.push(line);
  }

  close(): void {
    this.closed = true;
  }
}
