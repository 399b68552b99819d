import { PassThrough } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { createReadlinePrompter } from './prompt';

function createStreams(answer?: string) {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString('utf8');
  });
  if (answer === undefined) {
    input.end();
  } else {
    input.end(`${answer}\n`);
  }
  return { input, output, written: () => written };
}

describe('createReadlinePrompter', () => {
  it('returns the trimmed answer to an input prompt', async () => {
    const streams = createStreams('  NeoVim Setup ');
    const prompter = createReadlinePrompter(streams);

    expect(await prompter.input('Enter a new title: ')).toBe('NeoVim Setup');
  });

  it('treats a blank answer as cancelled', async () => {
    const prompter = createReadlinePrompter(createStreams(''));

    expect(await prompter.input('Enter a new title: ')).toBeUndefined();
  });

  it('treats end of input as cancelled', async () => {
    const prompter = createReadlinePrompter(createStreams());

    expect(await prompter.input('Enter a new title: ')).toBeUndefined();
  });

  it('lists numbered choices and returns the picked item', async () => {
    const streams = createStreams('2');
    const prompter = createReadlinePrompter(streams);

    const selected = await prompter.select(['editor', 'tools'], {
      prompt: 'Select a tag to toggle',
      format: (tag) => `☐ ${tag}`,
    });

    expect(selected).toBe('tools');
    expect(streams.written()).toContain('  1) ☐ editor\n  2) ☐ tools\n');
  });

  it('returns undefined for an answer outside the list', async () => {
    const prompter = createReadlinePrompter(createStreams('7'));

    const selected = await prompter.select(['editor'], {
      prompt: 'Select a tag to toggle',
      format: (tag) => tag,
    });

    expect(selected).toBeUndefined();
  });
});
