// direction.ts
// Headings, their unit vectors and the reversal rule.

import type { Position } from './grid.ts';

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

/** Unit vector per heading. Screen coordinates: y grows downward. */
export const VECTORS: Readonly<Record<Direction, Readonly<Position>>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 }
};

export const OPPOSITE: Readonly<Record<Direction, Direction>> = {
  up: 'down',
  down: 'up',
  left: 'right',
  right: 'left'
};

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some((d) => d === value);
}

export function isOpposite(a: Direction, b: Direction): boolean {
  return OPPOSITE[a] === b;
}

/**
 * Heading actually applied for a tick.
 * A request for the exact reverse of the current heading is ignored.
 * @param current - Heading the snake travelled on last tick.
 * @param requested - Heading asked for this tick.
 */
export function resolveHeading(current: Direction, requested: Direction): Direction {
  return isOpposite(current, requested) ? current : requested;
}

/**
 * Move a position one cell along a heading.
 * @param p - Starting cell.
 * @param d - Heading to move along.
 * @returns New position; may lie outside the grid.
 */
export function translate(p: Position, d: Direction): Position {
  const v = VECTORS[d];
  return { x: p.x + v.x, y: p.y + v.y };
}
