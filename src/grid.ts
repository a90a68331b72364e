// grid.ts
// Cell coordinates and bounds checks for the playing field.

export interface Position {
  x: number;
  y: number;
}

/** Board dimensions in cells. Fixed for the life of a session. */
export interface Grid {
  readonly width: number;
  readonly height: number;
}

export function inBounds(grid: Grid, p: Position): boolean {
  return p.x >= 0 && p.y >= 0 && p.x < grid.width && p.y < grid.height;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Stable string key for set lookups. */
export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}

export function cellCount(grid: Grid): number {
  return grid.width * grid.height;
}

/**
 * List every cell not covered by the occupied positions, row by row.
 * @param grid - Board dimensions.
 * @param occupied - Cells to exclude.
 * @returns Free cells in row-major order.
 */
export function emptyCells(grid: Grid, occupied: readonly Position[]): Position[] {
  const taken = new Set(occupied.map(positionKey));
  const cells: Position[] = [];
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (!taken.has(`${x},${y}`)) cells.push({ x, y });
    }
  }
  return cells;
}
