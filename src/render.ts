/** Helpers for drawing a game snapshot as lines of text. */

import type { GameSnapshot } from './game.ts';
import { THEME, paint, type Theme } from './theme.ts';

/** Where the session is, as far as the screen is concerned. */
export type RenderPhase = 'waiting' | 'playing' | 'paused' | 'over';

export interface RenderOptions {
  phase?: RenderPhase;
  /** Emit ANSI colours. Defaults to false so plain output stays comparable. */
  color?: boolean;
  theme?: Theme;
}

export const MESSAGES = {
  lost: 'You Lost! Press Q-Quit or C-Play Again',
  won: 'You Win! Press Q-Quit or C-Play Again',
  waiting: 'Press an arrow key to start',
  paused: 'Paused - press P to resume'
} as const;

/**
 * Pick the status line shown under the board, if any.
 * @param snapshot - Game snapshot being drawn.
 * @param phase - Session phase.
 */
export function statusMessage(snapshot: GameSnapshot, phase: RenderPhase): string | null {
  if (!snapshot.alive) return MESSAGES.lost;
  if (snapshot.won) return MESSAGES.won;
  if (phase === 'waiting') return MESSAGES.waiting;
  if (phase === 'paused') return MESSAGES.paused;
  return null;
}

/**
 * Render a snapshot into screen lines: score, framed board, status.
 * @param snapshot - Game snapshot to draw.
 * @param options - Phase, colour and theme overrides.
 * @returns One string per terminal line, without trailing newlines.
 */
export function renderFrame(snapshot: GameSnapshot, options: RenderOptions = {}): string[] {
  const theme = options.theme ?? THEME;
  const color = options.color ?? false;
  const phase = options.phase ?? 'playing';
  const { width, height } = snapshot.grid;
  const { glyphs, colors } = theme;

  const cells: string[][] = [];
  for (let y = 0; y < height; y++) {
    cells.push(new Array<string>(width).fill(glyphs.empty));
  }
  const put = (x: number, y: number, text: string) => {
    const row = cells[y];
    if (!row || x < 0 || x >= width) return;
    row[x] = text;
  };

  if (snapshot.food) {
    put(snapshot.food.x, snapshot.food.y, paint(glyphs.food, colors.food, color));
  }
  // Draw tail first so the head wins on any overlap.
  for (let i = snapshot.snake.length - 1; i >= 1; i--) {
    const segment = snapshot.snake[i];
    if (segment) put(segment.x, segment.y, paint(glyphs.body, colors.body, color));
  }
  const head = snapshot.snake[0];
  if (head) {
    const headText = snapshot.alive
      ? paint(glyphs.head, colors.head, color)
      : paint(glyphs.crash, colors.crash, color);
    put(head.x, head.y, headText);
  }

  const edge = paint(`+${'-'.repeat(width)}+`, colors.border, color);
  const side = paint('|', colors.border, color);
  const lines = [paint(`Your Score: ${snapshot.score}`, colors.score, color), edge];
  for (const row of cells) lines.push(`${side}${row.join('')}${side}`);
  lines.push(edge);

  const message = statusMessage(snapshot, phase);
  if (message) lines.push(paint(message, colors.message, color));
  return lines;
}
