import type { AskOptions, Prompter } from '../../src/core/configure/index.js';

/**
 * Prompter that replays canned answers in order. An empty answer takes the
 * prompt's default, as the terminal prompter does.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly printed: string[] = [];
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  private next(question: string): string {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${question}`);
    }
    return answer;
  }

  async ask(question: string, options: AskOptions = {}): Promise<string> {
    const answer = this.next(question);
    return answer === '' ? (options.default ?? '') : answer;
  }

  async confirm(question: string, defaultValue: boolean): Promise<boolean> {
    const answer = this.next(question).toLowerCase();
    return answer === '' ? defaultValue : answer === 'y';
  }

  async choose(question: string, choices: readonly string[], defaultChoice: string): Promise<string> {
    const answer = this.next(question);
    return answer === '' ? defaultChoice : (choices.find((choice) => choice === answer) ?? defaultChoice);
  }

  print(message: string = ''): void {
    this.printed.push(message);
  }
}
