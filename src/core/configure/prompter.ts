/**
 * Operator prompts
 */

import { createInterface, type Interface } from 'node:readline/promises';
import type { ValidationResult } from '../validation/index.js';

export interface AskOptions {
  /** Returned when the operator submits an empty answer */
  default?: string;
}

/**
 * Everything the configurator needs from a terminal
 */
export interface Prompter {
  ask(question: string, options?: AskOptions): Promise<string>;
  confirm(question: string, defaultValue: boolean): Promise<boolean>;
  choose(question: string, choices: readonly string[], defaultChoice: string): Promise<string>;
  print(message?: string): void;
}

const YES = new Set(['y', 'yes']);
const NO = new Set(['n', 'no']);

/**
 * Prompter over a readline interface; stdin/stdout unless streams are given
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
  }

  async ask(question: string, options: AskOptions = {}): Promise<string> {
    const suffix = options.default ? ` [${options.default}]` : '';
    const answer = await this.rl.question(`${question}${suffix}: `);
    return answer.trim() === '' ? (options.default ?? '') : answer;
  }

  async confirm(question: string, defaultValue: boolean): Promise<boolean> {
    for (;;) {
      const answer = (await this.rl.question(`${question} [${defaultValue ? 'Y/n' : 'y/N'}]: `))
        .trim()
        .toLowerCase();
      if (answer === '') return defaultValue;
      if (YES.has(answer)) return true;
      if (NO.has(answer)) return false;
      this.print('Please answer y or n.');
    }
  }

  async choose(question: string, choices: readonly string[], defaultChoice: string): Promise<string> {
    for (;;) {
      const answer = (await this.ask(`${question} [${choices.join('/')}]`, { default: defaultChoice }))
        .trim()
        .toLowerCase();
      const match = choices.find((choice) => choice.toLowerCase() === answer);
      if (match !== undefined) return match;
      this.print(`Please select one of: ${choices.join(', ')}`);
    }
  }

  print(message: string = ''): void {
    this.output.write(`${message}\n`);
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Ask until `validate` accepts the answer, printing each rejection
 */
export async function askValid<T>(
  prompter: Prompter,
  question: string,
  validate: (answer: string) => ValidationResult<T>,
  options: AskOptions = {}
): Promise<T> {
  for (;;) {
    const result = validate(await prompter.ask(question, options));
    if (result.ok) {
      return result.value;
    }
    prompter.print(result.error.message);
  }
}
