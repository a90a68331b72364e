import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { KeyPress } from './input.ts';

const CSI = '\u001b[';

/** Control sequences used to repaint in place. */
export const ANSI = {
  home: `${CSI}H`,
  clearScreen: `${CSI}2J`,
  clearLine: `${CSI}K`,
  clearBelow: `${CSI}J`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`
} as const;

/** Keyboard stream; TTY fields are present on process.stdin when attached to a terminal. */
export type KeyboardInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** Full-screen text surface that repaints from the top-left corner. */
export class TerminalScreen {
  /** Stream the frames are written to. */
  private readonly output: Writable;
  /** Whether the screen has been opened and not yet closed. */
  private active = false;

  constructor(output: Writable) {
    this.output = output;
  }

  /** Clear the screen and hide the cursor. */
  open(): void {
    if (this.active) return;
    this.active = true;
    this.output.write(`${ANSI.hideCursor}${ANSI.clearScreen}${ANSI.home}`);
  }

  /**
   * Repaint the screen with the given lines.
   * @param lines - Screen lines without newlines.
   */
  draw(lines: string[]): void {
    if (!this.active) return;
    const body = lines.map((line) => `${line}${ANSI.clearLine}`).join('\n');
    this.output.write(`${ANSI.home}${body}\n${ANSI.clearBelow}`);
  }

  /** Restore the cursor. Safe to call more than once. */
  close(): void {
    if (!this.active) return;
    this.active = false;
    this.output.write(ANSI.showCursor);
  }

  isActive(): boolean {
    return this.active;
  }
}

/**
 * Start delivering keypresses from a stream.
 * @param input - Keyboard stream, usually process.stdin.
 * @param onKey - Called once per decoded keypress.
 * @returns Function that detaches the listener and restores cooked mode.
 */
export function attachKeyboard(input: KeyboardInput, onKey: (key: KeyPress) => void): () => void {
  readline.emitKeypressEvents(input);
  const raw = Boolean(input.isTTY) && typeof input.setRawMode === 'function';
  if (raw) input.setRawMode?.(true);

  const listener = (str: string | undefined, key: KeyPress | undefined) => {
    if (key) {
      onKey(key);
    } else if (str) {
      onKey({ name: str, sequence: str });
    }
  };
  input.on('keypress', listener);
  input.resume();

  let attached = true;
  return () => {
    if (!attached) return;
    attached = false;
    input.off('keypress', listener);
    if (raw) input.setRawMode?.(false);
    input.pause();
  };
}
