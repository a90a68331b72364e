// theme.ts
// Glyphs and ANSI colours for the text board.

export interface Theme {
  glyphs: {
    head: string;
    body: string;
    /** Head glyph once the snake has crashed. */
    crash: string;
    food: string;
    empty: string;
  };
  /** SGR parameters, e.g. '32' for green. */
  colors: {
    head: string;
    body: string;
    crash: string;
    food: string;
    border: string;
    score: string;
    message: string;
  };
}

export const THEME: Theme = {
  glyphs: {
    head: '@',
    body: 'o',
    crash: 'X',
    food: '*',
    empty: ' '
  },
  colors: {
    head: '1;32',
    body: '32',
    crash: '1;31',
    food: '31',
    border: '90',
    score: '32',
    message: '31'
  }
};

/**
 * Wrap text in an ANSI colour sequence.
 * @param text - Text to colour.
 * @param color - SGR parameters.
 * @param enabled - When false the text is returned unchanged.
 */
export function paint(text: string, color: string, enabled: boolean): string {
  if (!enabled || !text) return text;
  return `\u001b[${color}m${text}\u001b[0m`;
}
