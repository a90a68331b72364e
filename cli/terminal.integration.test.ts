import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import type { KeyPress } from './input.ts';
import { ANSI, TerminalScreen, attachKeyboard } from './terminal.ts';

/** Test suite label for terminal integration cases. */
const SUITE = 'terminal (integration)';

/** Writable that records every chunk synchronously. */
function recorder(): { stream: Writable; written: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    }
  });
  return { stream, written: () => chunks.join('') };
}

describe(SUITE, () => {
  it('repaints frames in place and restores the cursor on close', () => {
    const { stream, written } = recorder();
    const screen = new TerminalScreen(stream);

    screen.draw(['ignored']);
    expect(written()).toBe('');

    screen.open();
    screen.draw(['ab', 'cd']);
    screen.close();
    screen.close();

    expect(written()).toBe(
      `${ANSI.hideCursor}${ANSI.clearScreen}${ANSI.home}` +
        `${ANSI.home}ab${ANSI.clearLine}\ncd${ANSI.clearLine}\n${ANSI.clearBelow}` +
        ANSI.showCursor
    );
    expect(screen.isActive()).toBe(false);
  });

  it('decodes arrow keys and stops after detaching', async () => {
    const input = new PassThrough();
    const keys: KeyPress[] = [];
    let notify: () => void = () => {};
    const firstKey = new Promise<void>((resolve) => {
      notify = resolve;
    });
    const detach = attachKeyboard(input, (key) => {
      keys.push(key);
      notify();
    });

    input.write('\u001b[A');
    await firstKey;
    expect(keys).toHaveLength(1);
    expect(keys[0]?.name).toBe('up');

    detach();
    input.write('q');
    await new Promise((resolve) => setImmediate(resolve));
    expect(keys).toHaveLength(1);
  });
});
