import { describe, it, expect } from 'vitest';
import { createGame, isOver, step, type GameState } from './game.ts';
import { sequenceRng } from './rng.ts';

/** Test suite label for game edge-case regressions. */
const SUITE = 'game (regression)';

describe(SUITE, () => {
  it('ends the session as a win when the last free cell is eaten', () => {
    const state: GameState = {
      grid: { width: 2, height: 2 },
      options: { width: 2, height: 2, startLength: 3, startHeading: 'up' },
      snake: [
        { x: 0, y: 0 },
        { x: 0, y: 1 },
        { x: 1, y: 1 }
      ],
      heading: 'up',
      food: { x: 1, y: 0 },
      score: 2,
      alive: true,
      won: false,
      ticks: 5
    };
    step(state, 'right', sequenceRng([0]));
    expect(state.snake).toHaveLength(4);
    expect(state.score).toBe(3);
    expect(state.food).toBeNull();
    expect(state.won).toBe(true);
    expect(state.alive).toBe(true);
    expect(isOver(state)).toBe(true);

    step(state, 'down', sequenceRng([0]));
    expect(state.snake[0]).toEqual({ x: 1, y: 0 });
    expect(state.ticks).toBe(6);
  });

  it('a two-segment snake cannot fold back onto its neck', () => {
    const state = createGame(
      { width: 6, height: 6, startLength: 2, startHeading: 'left' },
      sequenceRng([0])
    );
    expect(state.snake).toEqual([
      { x: 3, y: 3 },
      { x: 4, y: 3 }
    ]);
    step(state, 'right');
    expect(state.alive).toBe(true);
    expect(state.snake).toEqual([
      { x: 2, y: 3 },
      { x: 3, y: 3 }
    ]);
  });

  it('a one-segment snake never collides with itself', () => {
    const state = createGame({ width: 5, height: 5, startLength: 1 }, sequenceRng([0]));
    step(state, 'up');
    step(state, 'left');
    step(state, 'down');
    step(state, 'right');
    expect(state.alive).toBe(true);
    expect(state.snake).toEqual([{ x: 2, y: 2 }]);
    expect(state.ticks).toBe(4);
  });
});
