import { describe, it, expect } from 'vitest';
import { cellCount, emptyCells, inBounds, positionKey, samePosition } from './grid.ts';

/** Test suite label for grid helpers. */
const SUITE = 'grid (unit)';

describe(SUITE, () => {
  const grid = { width: 3, height: 2 };

  it('bounds are half-open on both axes', () => {
    expect(inBounds(grid, { x: 0, y: 0 })).toBe(true);
    expect(inBounds(grid, { x: 2, y: 1 })).toBe(true);
    expect(inBounds(grid, { x: 3, y: 0 })).toBe(false);
    expect(inBounds(grid, { x: 0, y: 2 })).toBe(false);
    expect(inBounds(grid, { x: -1, y: 0 })).toBe(false);
  });

  it('lists free cells in row-major order', () => {
    const cells = emptyCells(grid, [
      { x: 0, y: 0 },
      { x: 2, y: 1 }
    ]);
    expect(cells).toEqual([
      { x: 1, y: 0 },
      { x: 2, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 1 }
    ]);
    expect(emptyCells(grid, []).length).toBe(cellCount(grid));
  });

  it('compares and keys positions by value', () => {
    expect(samePosition({ x: 1, y: 2 }, { x: 1, y: 2 })).toBe(true);
    expect(samePosition({ x: 1, y: 2 }, { x: 2, y: 1 })).toBe(false);
    expect(positionKey({ x: 4, y: 7 })).toBe('4,7');
  });
});
