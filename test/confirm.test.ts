import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import { alwaysConfirm, createTerminalConfirmer, isAffirmative } from '../src/confirm.js';

function promptStreams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk) => {
    written += chunk.toString();
  });
  return { input, output, written: () => written };
}

describe('isAffirmative', () => {
  it('accepts only y and Y', () => {
    expect(isAffirmative('y')).toBe(true);
    expect(isAffirmative('Y')).toBe(true);
    expect(isAffirmative('  y ')).toBe(true);
    expect(isAffirmative('yes')).toBe(false);
    expect(isAffirmative('n')).toBe(false);
    expect(isAffirmative('')).toBe(false);
  });
});

describe('alwaysConfirm', () => {
  it('confirms without asking', async () => {
    await expect(alwaysConfirm.confirm('Proceed? [y/N] ')).resolves.toBe(true);
  });
});

describe('terminal confirmer', () => {
  it('writes the question and accepts y', async () => {
    const { input, output, written } = promptStreams();
    const pending = createTerminalConfirmer(input, output).confirm('Proceed? [y/N] ');
    input.write('y\n');
    await expect(pending).resolves.toBe(true);
    expect(written()).toBe('Proceed? [y/N] ');
  });

  it('treats any other answer as a refusal', async () => {
    const { input, output } = promptStreams();
    const pending = createTerminalConfirmer(input, output).confirm('Proceed? [y/N] ');
    input.write('yes please\n');
    await expect(pending).resolves.toBe(false);
  });

  it('treats end of input as a refusal', async () => {
    const { input, output } = promptStreams();
    const pending = createTerminalConfirmer(input, output).confirm('Proceed? [y/N] ');
    input.end();
    await expect(pending).resolves.toBe(false);
  });
});
