import type { Direction } from '../src/direction.ts';

/** Keypress shape emitted by `readline.emitKeypressEvents`. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type InputCommand =
  | { type: 'direction'; direction: Direction }
  | { type: 'pause' }
  | { type: 'restart' }
  | { type: 'quit' };

/** Key names that steer the snake. */
const DIRECTION_KEYS: Record<string, Direction> = {
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  w: 'up',
  s: 'down',
  a: 'left',
  d: 'right'
};

/**
 * Map a keypress to a session command.
 * @param key - Keypress from the terminal.
 * @returns Command, or null for keys the game ignores.
 */
export function parseKey(key: KeyPress): InputCommand | null {
  const name = (key.name ?? key.sequence ?? '').toLowerCase();
  if (!name) return null;
  if (key.ctrl) {
    return name === 'c' ? { type: 'quit' } : null;
  }
  const direction = DIRECTION_KEYS[name];
  if (direction) return { type: 'direction', direction };
  switch (name) {
    case 'q':
    case 'escape':
      return { type: 'quit' };
    case 'c':
    case 'r':
      return { type: 'restart' };
    case 'p':
    case 'space':
      return { type: 'pause' };
    default:
      return null;
  }
}
