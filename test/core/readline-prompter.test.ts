import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ReadlinePrompter } from '../../src/core/configure/index.js';

describe('ReadlinePrompter', () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;
  let prompter: ReadlinePrompter;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    prompter = new ReadlinePrompter(input, output);
  });

  afterEach(() => {
    prompter.close();
  });

  /** Answer once `text` has been written, so no line arrives before its question */
  async function answerAfter(text: string, line: string): Promise<void> {
    await vi.waitFor(() => expect(written).toContain(text));
    input.write(`${line}\n`);
  }

  it('shows the default and returns it for an empty answer', async () => {
    const answer = prompter.ask('Namespace', { default: 'games' });
    await answerAfter('Namespace [games]: ', '');
    await expect(answer).resolves.toBe('games');
  });

  it('returns a typed answer as given', async () => {
    const answer = prompter.ask('Container image');
    await answerAfter('Container image: ', 'ghcr.io/example/app:1');
    await expect(answer).resolves.toBe('ghcr.io/example/app:1');
  });

  it('asks again until a confirmation is y or n', async () => {
    const answer = prompter.confirm('Use detected ports [25565]?', false);
    await answerAfter('Use detected ports [25565]? [y/N]: ', 'maybe');
    await answerAfter('Please answer y or n.', 'YES');
    await expect(answer).resolves.toBe(true);
  });

  it('takes the confirmation default for an empty answer', async () => {
    const answer = prompter.confirm('Generate a file manager password?', true);
    await answerAfter('[Y/n]: ', '');
    await expect(answer).resolves.toBe(true);
  });

  it('matches choices case-insensitively', async () => {
    const answer = prompter.choose('overwrite or abort', ['overwrite', 'abort'], 'abort');
    await answerAfter('overwrite or abort [overwrite/abort] [abort]: ', 'skip');
    await answerAfter('Please select one of: overwrite, abort', 'Overwrite');
    await expect(answer).resolves.toBe('overwrite');
  });

  it('prints messages on their own line', async () => {
    prompter.print('Detected images:');
    prompter.print();
    await vi.waitFor(() => expect(written).toBe('Detected images:\n\n'));
  });
});
