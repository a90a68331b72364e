/**
 * Snake game state and the per-tick update.
 *
 * The state is a plain value owned by whoever created it. `step` mutates it
 * in place and hands it back, so callers can either keep one instance
 * alive for a whole session or treat each call as state in, state out.
 * Nothing here touches a terminal, a timer or global randomness unless the
 * caller leaves the random source at its default.
 */

import { GAME_DEFAULTS, MIN_GRID_SIZE, type GameOptions } from './config.ts';
import { OPPOSITE, resolveHeading, translate, type Direction } from './direction.ts';
import { emptyCells, inBounds, samePosition, type Grid, type Position } from './grid.ts';
import { randomInt, type RandomSource } from './rng.ts';
import { clamp } from './utils.ts';

/** Canonical game state. Head is `snake[0]`. */
export interface GameState {
  readonly grid: Grid;
  /** Start layout used to rebuild the state on restart. */
  readonly options: Readonly<GameOptions>;
  snake: Position[];
  heading: Direction;
  /** Null only once the snake covers every cell. */
  food: Position | null;
  score: number;
  alive: boolean;
  won: boolean;
  /** Ticks on which the snake actually moved. */
  ticks: number;
}

/** Read-only copy handed to renderers. */
export interface GameSnapshot {
  readonly grid: Grid;
  readonly snake: ReadonlyArray<Readonly<Position>>;
  readonly heading: Direction;
  readonly food: Readonly<Position> | null;
  readonly score: number;
  readonly alive: boolean;
  readonly won: boolean;
  readonly ticks: number;
  readonly length: number;
}

/**
 * Longest straight snake that fits between the centre head and the wall
 * behind it.
 */
function maxStartLength(grid: Grid, head: Position, heading: Direction): number {
  switch (OPPOSITE[heading]) {
    case 'left': return head.x + 1;
    case 'right': return grid.width - head.x;
    case 'up': return head.y + 1;
    case 'down': return grid.height - head.y;
  }
}

/**
 * Pick a uniformly random free cell for the food.
 * @param grid - Board dimensions.
 * @param snake - Segments the food must avoid.
 * @param rng - Random source.
 * @returns A free cell, or null when the snake fills the board.
 */
export function placeFood(grid: Grid, snake: readonly Position[], rng: RandomSource): Position | null {
  const cells = emptyCells(grid, snake);
  if (!cells.length) return null;
  return cells[randomInt(rng, cells.length)] ?? null;
}

/**
 * Build a fresh game: a straight snake with its head in the centre cell,
 * tail trailing opposite the heading, and one piece of food.
 * @param options - Board size and start layout; missing fields use defaults.
 * @param rng - Random source for food placement.
 * @throws RangeError when the board is smaller than 2x2.
 */
export function createGame(options: Partial<GameOptions> = {}, rng: RandomSource = Math.random): GameState {
  const merged: GameOptions = { ...GAME_DEFAULTS, ...options };
  const width = Math.floor(merged.width);
  const height = Math.floor(merged.height);
  if (!(width >= MIN_GRID_SIZE) || !(height >= MIN_GRID_SIZE)) {
    throw new RangeError(`grid must be at least ${MIN_GRID_SIZE}x${MIN_GRID_SIZE}, got ${merged.width}x${merged.height}`);
  }
  const grid: Grid = { width, height };
  const heading = merged.startHeading;
  const head: Position = { x: Math.floor(width / 2), y: Math.floor(height / 2) };
  const length = clamp(Math.floor(merged.startLength) || 1, 1, maxStartLength(grid, head, heading));

  const snake: Position[] = [head];
  for (let i = 1; i < length; i++) {
    const prev = snake[i - 1] ?? head;
    snake.push(translate(prev, OPPOSITE[heading]));
  }

  return {
    grid,
    options: { width, height, startLength: length, startHeading: heading },
    snake,
    heading,
    food: placeFood(grid, snake, rng),
    score: 0,
    alive: true,
    won: false,
    ticks: 0
  };
}

/**
 * Start over on the same board with the same start layout.
 * @param state - Finished or running game.
 * @param rng - Random source for the new food.
 * @returns A new state; the old one is left untouched.
 */
export function resetGame(state: GameState, rng: RandomSource = Math.random): GameState {
  return createGame(state.options, rng);
}

export function isOver(state: GameState): boolean {
  return !state.alive || state.won;
}

/**
 * Whether a cell is a wall hit or lands on the body. The tail is left out
 * since it moves away on a tick without food.
 */
export function checkCollision(state: GameState, p: Position): boolean {
  if (!inBounds(state.grid, p)) return true;
  return state.snake.slice(0, -1).some((segment) => samePosition(segment, p));
}

/**
 * Advance the game by one tick.
 *
 * A reversal request keeps the current heading. On a wall or body hit the
 * snake dies and nothing else changes. Eating grows the snake by one, bumps
 * the score and moves the food; if no free cell is left the game is won.
 *
 * @param state - Game to advance; mutated in place.
 * @param requested - Heading asked for this tick.
 * @param rng - Random source for replacing eaten food.
 * @returns The same state object.
 */
export function step(state: GameState, requested: Direction, rng: RandomSource = Math.random): GameState {
  if (isOver(state)) return state;
  const head = state.snake[0];
  if (!head) {
    state.alive = false;
    return state;
  }

  const heading = resolveHeading(state.heading, requested);
  const next = translate(head, heading);
  if (!inBounds(state.grid, next)) {
    state.alive = false;
    return state;
  }

  const eating = state.food !== null && samePosition(next, state.food);
  const blocking = eating ? state.snake : state.snake.slice(0, -1);
  if (blocking.some((segment) => samePosition(segment, next))) {
    state.alive = false;
    return state;
  }

  state.heading = heading;
  state.snake.unshift(next);
  if (eating) {
    state.score += 1;
    state.food = placeFood(state.grid, state.snake, rng);
    if (!state.food) state.won = true;
  } else {
    state.snake.pop();
  }
  state.ticks += 1;
  return state;
}

/**
 * Deep copy of the state for rendering.
 * @param state - Live game state.
 */
export function snapshotGame(state: GameState): GameSnapshot {
  return {
    grid: { width: state.grid.width, height: state.grid.height },
    snake: state.snake.map((p) => ({ x: p.x, y: p.y })),
    heading: state.heading,
    food: state.food ? { x: state.food.x, y: state.food.y } : null,
    score: state.score,
    alive: state.alive,
    won: state.won,
    ticks: state.ticks,
    length: state.snake.length
  };
}
