import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { ask } from '../../../src/cli/prompt';

describe('ask', () => {
  it('accepts y and yes in any case', async () => {
    for (const answer of ['y', 'YES', ' Yes ']) {
      const input = new PassThrough();
      const pending = ask('Remove api?', input, new PassThrough());
      input.end(`${answer}\n`);

      expect(await pending).toBe(true);
    }
  });

  it('treats any other answer as no', async () => {
    const input = new PassThrough();
    const pending = ask('Remove api?', input, new PassThrough());
    input.end('nope\n');

    expect(await pending).toBe(false);
  });

  it('answers no when input ends without an answer', async () => {
    const input = new PassThrough();
    const pending = ask('Remove api?', input, new PassThrough());
    input.end();

    expect(await pending).toBe(false);
  });

  it('writes the question with the default shown', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });

    const pending = ask('Remove api?', input, output);
    input.end('n\n');
    await pending;

    expect(written).toContain('Remove api? [y/N] ');
  });
});
