// config.ts
// Default board and start layout for a game session.

import { isDirection, type Direction } from './direction.ts';
import { coerceInt } from './utils.ts';

/** Options that shape a fresh game. */
export interface GameOptions {
  width: number;
  height: number;
  /** Segments laid out at session start, head included. */
  startLength: number;
  startHeading: Direction;
}

// 40x30 cells matches an 800x600 board drawn with 20px blocks.
export const GAME_DEFAULTS: Readonly<GameOptions> = {
  width: 40,
  height: 30,
  startLength: 3,
  startHeading: 'right'
};

export const MIN_GRID_SIZE = 2;
export const MAX_GRID_SIZE = 200;

/**
 * Fill in and clamp game options.
 * @param input - Loose options from config files, env or flags.
 * @param warn - Optional sink for adjustment warnings.
 * @returns Complete options safe to hand to createGame.
 */
export function normalizeGameOptions(
  input: { [K in keyof GameOptions]?: unknown },
  warn?: (msg: string) => void
): GameOptions {
  const width = coerceInt('width', input.width, GAME_DEFAULTS.width, MIN_GRID_SIZE, MAX_GRID_SIZE, warn);
  const height = coerceInt('height', input.height, GAME_DEFAULTS.height, MIN_GRID_SIZE, MAX_GRID_SIZE, warn);
  const startLength = coerceInt(
    'startLength',
    input.startLength,
    GAME_DEFAULTS.startLength,
    1,
    Math.max(width, height),
    warn
  );
  let startHeading = GAME_DEFAULTS.startHeading;
  if (input.startHeading !== undefined) {
    if (isDirection(input.startHeading)) {
      startHeading = input.startHeading;
    } else {
      warn?.(`startHeading "${String(input.startHeading)}" is invalid; using ${startHeading}.`);
    }
  }
  return { width, height, startLength, startHeading };
}
